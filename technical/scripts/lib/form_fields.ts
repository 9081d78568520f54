import { format, isValid, parse } from 'date-fns';

import type { FieldDictionary } from './suggestions.js';

export type YesNo = 'YES' | 'NO';

const DATE_INPUT_FORMATS = ['yyyy-MM-dd', 'dd-MM-yyyy', 'dd/MM/yyyy'] as const;
const DATE_FIELDS = ['PropDateRem', 'DednDateTds'] as const;

/** Values every Form 15CB submission starts from unless extraction said otherwise. */
export function fixedDefaults(now: Date = new Date()): FieldDictionary {
  return {
    SWVersionNo: '1',
    SWCreatedBy: 'DIT-EFILING-JAVA',
    XMLCreatedBy: 'DIT-EFILING-JAVA',
    XMLCreationDate: format(now, 'yyyy-MM-dd'),
    IntermediaryCity: 'Delhi',
    FormName: 'FORM15CB',
    Description: 'FORM15CB',
    AssessmentYear: '2025',
    SchemaVer: 'Ver1.1',
    FormVer: '1',
    IorWe: '02',
    RemitterHonorific: '03',
    BeneficiaryHonorific: '03'
  };
}

/** Fills defaults only where the key is absent; blank values stay blank. */
export function applyFixedDefaults(
  fields: Readonly<FieldDictionary>,
  now: Date = new Date()
): FieldDictionary {
  return { ...fixedDefaults(now), ...fields };
}

const DTAA_RESET_VALUES: Readonly<FieldDictionary> = {
  TaxResidCert: 'N',
  RelevantDtaa: '',
  RelevantArtDtaa: '',
  TaxIncDtaa: '',
  TaxLiablDtaa: '',
  RemForRoyFlg: 'N',
  ArtDtaa: '',
  RateTdsADtaa: '',
  RemAcctBusIncFlg: 'N',
  IncLiabIndiaFlg: 'N',
  RemOnCapGainFlg: 'N',
  OtherRemDtaa: 'N',
  RelArtDetlDDtaa: '',
  _inc_liab_india_detail: ''
};

export function resetDtaaFields(fields: Readonly<FieldDictionary>): FieldDictionary {
  return { ...fields, ...DTAA_RESET_VALUES };
}

export function yesNoToYn(value: string): 'Y' | 'N' {
  return value === 'YES' ? 'Y' : 'N';
}

export function ynToYesNo(value: string | null | undefined): YesNo {
  const upper = (value ?? '').toUpperCase();
  return upper === 'Y' || upper === 'YES' ? 'YES' : 'NO';
}

export function floatOrNull(raw: string | null | undefined): number | null {
  const value = (raw ?? '').trim();
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseFormDate(raw: string | null | undefined, reference: Date = new Date()): Date | null {
  const value = (raw ?? '').trim();
  if (!value) {
    return null;
  }
  for (const pattern of DATE_INPUT_FORMATS) {
    const parsed = parse(value, pattern, reference);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
}

export function formatDdMmmYyyy(date: Date): string {
  return format(date, 'dd-MMM-yyyy');
}

/** Rewrites recognised dates as yyyy-MM-dd and derives the amount remitted after TDS. */
export function deriveFormFields(
  fields: Readonly<FieldDictionary>,
  reference: Date = new Date()
): FieldDictionary {
  const derived: FieldDictionary = { ...fields };

  for (const field of DATE_FIELDS) {
    const parsed = parseFormDate(derived[field], reference);
    if (parsed) {
      derived[field] = format(parsed, 'yyyy-MM-dd');
    }
  }

  const gross = floatOrNull(derived.AmtPayForgnRem);
  const tds = floatOrNull(derived.AmtPayForgnTds);
  if (gross !== null && tds !== null) {
    derived.ActlAmtTdsForgn = String(gross - tds);
  }

  return derived;
}
