export const FORM_NAMESPACES = {
  Form: 'http://incometaxindiaefiling.gov.in/common',
  FORM15CB: 'http://incometaxindiaefiling.gov.in/FORM15CAB'
} as const;

export interface TagMapping {
  /** Slash-separated `Prefix:LocalName` steps below the document root. */
  path: string;
  field: string;
}

export const MANDATORY_FIELDS = [
  'SWVersionNo',
  'FormName',
  'AssessmentYear',
  'RemitterPAN',
  'NameRemitter'
] as const;

export const TAG_MAP: readonly TagMapping[] = [
  { path: 'Form:CreationInfo/Form:SWVersionNo', field: 'SWVersionNo' },
  { path: 'Form:CreationInfo/Form:SWCreatedBy', field: 'SWCreatedBy' },
  { path: 'Form:CreationInfo/Form:XMLCreatedBy', field: 'XMLCreatedBy' },
  { path: 'Form:CreationInfo/Form:XMLCreationDate', field: 'XMLCreationDate' },
  { path: 'Form:CreationInfo/Form:IntermediaryCity', field: 'IntermediaryCity' },
  { path: 'Form:Form_Details/Form:FormName', field: 'FormName' },
  { path: 'Form:Form_Details/Form:Description', field: 'Description' },
  { path: 'Form:Form_Details/Form:AssessmentYear', field: 'AssessmentYear' },
  { path: 'Form:Form_Details/Form:SchemaVer', field: 'SchemaVer' },
  { path: 'Form:Form_Details/Form:FormVer', field: 'FormVer' },
  { path: 'FORM15CB:RemitterDetails/FORM15CB:IorWe', field: 'IorWe' },
  { path: 'FORM15CB:RemitterDetails/FORM15CB:RemitterHonorific', field: 'RemitterHonorific' },
  { path: 'FORM15CB:RemitterDetails/FORM15CB:NameRemitter', field: 'NameRemitter' },
  { path: 'FORM15CB:RemitterDetails/FORM15CB:PAN', field: 'RemitterPAN' },
  { path: 'FORM15CB:RemitterDetails/FORM15CB:BeneficiaryHonorific', field: 'BeneficiaryHonorific' },
  { path: 'FORM15CB:RemitteeDetls/FORM15CB:NameRemittee', field: 'NameRemittee' },
  {
    path: 'FORM15CB:RemitteeDetls/FORM15CB:RemitteeAddrs/FORM15CB:TownCityDistrict',
    field: 'RemitteeTownCityDistrict'
  },
  {
    path: 'FORM15CB:RemitteeDetls/FORM15CB:RemitteeAddrs/FORM15CB:FlatDoorBuilding',
    field: 'RemitteeFlatDoorBuilding'
  },
  {
    path: 'FORM15CB:RemitteeDetls/FORM15CB:RemitteeAddrs/FORM15CB:AreaLocality',
    field: 'RemitteeAreaLocality'
  },
  { path: 'FORM15CB:RemitteeDetls/FORM15CB:RemitteeAddrs/FORM15CB:ZipCode', field: 'RemitteeZipCode' },
  { path: 'FORM15CB:RemitteeDetls/FORM15CB:RemitteeAddrs/Form:State', field: 'RemitteeState' },
  { path: 'FORM15CB:RemitteeDetls/FORM15CB:RemitteeAddrs/FORM15CB:Country', field: 'RemitteeCountryCode' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:CountryRemMadeSecb', field: 'CountryRemMadeSecb' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:CurrencySecbCode', field: 'CurrencySecbCode' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:AmtPayForgnRem', field: 'AmtPayForgnRem' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:AmtPayIndRem', field: 'AmtPayIndRem' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:NameBankCode', field: 'NameBankCode' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:BranchName', field: 'BranchName' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:BsrCode', field: 'BsrCode' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:PropDateRem', field: 'PropDateRem' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:NatureRemCategory', field: 'NatureRemCategory' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:RevPurCategory', field: 'RevPurCategory' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:RevPurCode', field: 'RevPurCode' },
  { path: 'FORM15CB:RemittanceDetails/FORM15CB:TaxPayGrossSecb', field: 'TaxPayGrossSecb' },
  { path: 'FORM15CB:ItActDetails/FORM15CB:RemittanceCharIndia', field: 'RemittanceCharIndia' },
  { path: 'FORM15CB:ItActDetails/FORM15CB:SecRemCovered', field: 'SecRemCovered' },
  { path: 'FORM15CB:ItActDetails/FORM15CB:AmtIncChrgIt', field: 'AmtIncChrgIt' },
  { path: 'FORM15CB:ItActDetails/FORM15CB:TaxLiablIt', field: 'TaxLiablIt' },
  { path: 'FORM15CB:ItActDetails/FORM15CB:BasisDeterTax', field: 'BasisDeterTax' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:TaxResidCert', field: 'TaxResidCert' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:RelevantDtaa', field: 'RelevantDtaa' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:RelevantArtDtaa', field: 'RelevantArtDtaa' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:TaxIncDtaa', field: 'TaxIncDtaa' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:TaxLiablDtaa', field: 'TaxLiablDtaa' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:RemForRoyFlg', field: 'RemForRoyFlg' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:ArtDtaa', field: 'ArtDtaa' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:RateTdsADtaa', field: 'RateTdsADtaa' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:RemAcctBusIncFlg', field: 'RemAcctBusIncFlg' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:IncLiabIndiaFlg', field: 'IncLiabIndiaFlg' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:RemOnCapGainFlg', field: 'RemOnCapGainFlg' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:OtherRemDtaa', field: 'OtherRemDtaa' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:TaxIndDtaaFlg', field: 'TaxIndDtaaFlg' },
  { path: 'FORM15CB:DTAADetails/FORM15CB:RelArtDetlDDtaa', field: 'RelArtDetlDDtaa' },
  { path: 'FORM15CB:TDSDetails/FORM15CB:AmtPayForgnTds', field: 'AmtPayForgnTds' },
  { path: 'FORM15CB:TDSDetails/FORM15CB:AmtPayIndianTds', field: 'AmtPayIndianTds' },
  { path: 'FORM15CB:TDSDetails/FORM15CB:RateTdsSecbFlg', field: 'RateTdsSecbFlg' },
  { path: 'FORM15CB:TDSDetails/FORM15CB:RateTdsSecB', field: 'RateTdsSecB' },
  { path: 'FORM15CB:TDSDetails/FORM15CB:ActlAmtTdsForgn', field: 'ActlAmtTdsForgn' },
  { path: 'FORM15CB:TDSDetails/FORM15CB:DednDateTds', field: 'DednDateTds' },
  { path: 'FORM15CB:AcctntDetls/FORM15CB:NameAcctnt', field: 'NameAcctnt' },
  { path: 'FORM15CB:AcctntDetls/FORM15CB:NameFirmAcctnt', field: 'NameFirmAcctnt' },
  {
    path: 'FORM15CB:AcctntDetls/FORM15CB:AcctntAddrs/FORM15CB:PremisesBuildingVillage',
    field: 'PremisesBuildingVillage'
  },
  {
    path: 'FORM15CB:AcctntDetls/FORM15CB:AcctntAddrs/FORM15CB:TownCityDistrict',
    field: 'AcctntTownCityDistrict'
  },
  {
    path: 'FORM15CB:AcctntDetls/FORM15CB:AcctntAddrs/FORM15CB:FlatDoorBuilding',
    field: 'AcctntFlatDoorBuilding'
  },
  { path: 'FORM15CB:AcctntDetls/FORM15CB:AcctntAddrs/FORM15CB:AreaLocality', field: 'AcctntAreaLocality' },
  { path: 'FORM15CB:AcctntDetls/FORM15CB:AcctntAddrs/FORM15CB:Pincode', field: 'AcctntPincode' },
  { path: 'FORM15CB:AcctntDetls/FORM15CB:AcctntAddrs/Form:State', field: 'AcctntState' },
  { path: 'FORM15CB:AcctntDetls/FORM15CB:AcctntAddrs/FORM15CB:RoadStreet', field: 'AcctntRoadStreet' },
  { path: 'FORM15CB:AcctntDetls/FORM15CB:AcctntAddrs/FORM15CB:Country', field: 'AcctntCountryCode' },
  { path: 'FORM15CB:AcctntDetls/FORM15CB:MembershipNumber', field: 'MembershipNumber' }
];

export const FORM_FIELD_KEYS: readonly string[] = TAG_MAP.map((mapping) => mapping.field);
