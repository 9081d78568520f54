const PAN_PATTERN = /^[A-Z]{5}[0-9]{4}[A-Z]$/;
const BSR_PATTERN = /^\d{7}$/;
const PURPOSE_CODE_PATTERN = /^RB-\d{2}\.\d(?:-S\d{4})?$/;
const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function validatePan(pan: string | null | undefined): boolean {
  return PAN_PATTERN.test((pan ?? '').trim().toUpperCase());
}

export function digitsOnly(value: string | null | undefined): string {
  return (value ?? '').replace(/\D/g, '');
}

export function validateBsrCode(bsr: string | null | undefined): boolean {
  return BSR_PATTERN.test(digitsOnly(bsr));
}

export function validatePurposeCode(purpose: string | null | undefined): boolean {
  return PURPOSE_CODE_PATTERN.test((purpose ?? '').trim().toUpperCase());
}

export function validateDtaaRate(rate: string | null | undefined): boolean {
  const value = (rate ?? '').trim();
  if (!NUMBER_PATTERN.test(value)) {
    return false;
  }
  const parsed = Number(value);
  return parsed >= 0 && parsed <= 100;
}

export interface FormatIssue {
  field: string;
  value: string;
  message: string;
}

const FORMAT_RULES: Array<{
  field: string;
  check: (value: string) => boolean;
  message: string;
}> = [
  { field: 'RemitterPAN', check: validatePan, message: 'expected 5 letters, 4 digits, 1 letter' },
  { field: 'BsrCode', check: validateBsrCode, message: 'expected exactly 7 digits' },
  { field: 'RevPurCode', check: validatePurposeCode, message: 'expected RB-NN.N or RB-NN.N-SNNNN' },
  { field: 'RateTdsADtaa', check: validateDtaaRate, message: 'expected a number between 0 and 100' }
];

/** Codified fields that are filled in but malformed. Blank fields are skipped. */
export function findFormatIssues(fields: Record<string, string>): FormatIssue[] {
  const issues: FormatIssue[] = [];

  for (const rule of FORMAT_RULES) {
    const value = fields[rule.field];
    if (value === undefined || !value.trim()) {
      continue;
    }
    if (!rule.check(value)) {
      issues.push({ field: rule.field, value, message: rule.message });
    }
  }

  return issues;
}

export function maskPanForLog(pan: string | null | undefined): string {
  const value = (pan ?? '').trim().toUpperCase();
  if (value.length !== 10) {
    return value;
  }
  return `${value.slice(0, 2)}******${value.slice(-2)}`;
}
