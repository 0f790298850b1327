export {
  LEDGERJOB_VERSION,
  DEFAULT_CURRENCY,
  DEFAULT_DECIMAL,
  DATE_FORMATS,
  ACCOUNT_NUMBER_MAX_LENGTH,
  BANK_ID_MAX_LENGTH,
  LAST_RULE_PRIORITY,
  type DecimalSeparator,
} from './constants.js';
export {
  parseFlexibleDateTime,
  toInterchangeDateTime,
  toRecordDateTime,
  toDayStamp,
  DEFAULT_DATE_FORMATS,
  type DateInput,
} from './date.js';
export {
  parseAmount,
  parseAmountStrict,
  toRealAmount,
  normalizeAmountText,
} from './money.js';
export { capitalizeWords, hashString } from './text.js';
