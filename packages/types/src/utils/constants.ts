export const LEDGERJOB_VERSION = '0.4.0';

export const DEFAULT_CURRENCY = 'EUR';

export type DecimalSeparator = '.' | ',';

export const DEFAULT_DECIMAL: DecimalSeparator = '.';

export const DATE_FORMATS = {
  INTERCHANGE: 'YYYYMMDDHHmmss',
  RECORD: 'YYYY-MM-DD HH:mm:ss',
  DAY: 'YYYYMMDD',
} as const;

export const ACCOUNT_NUMBER_MAX_LENGTH = 22;

export const BANK_ID_MAX_LENGTH = 9;

/** Priority conventionally used by catch-all rules that must run after every other rule. */
export const LAST_RULE_PRIORITY = -999;
