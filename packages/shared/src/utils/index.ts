export { generateUlid, compareIdsDesc } from './ids';
export {
  toCents,
  toDollars,
  multiplyMoney,
  toDecimalString,
  fromDecimalString,
  MAX_MONEY_AMOUNT,
} from './money';
export {
  isCalendarDate,
  nightsBetween,
  toUtcCalendarDate,
  utcDayRange,
  staysOverlap,
} from './date';
