export {
  resolveDateSpec, formatDate, today, addDays, isCalendarDate,
  MIN_DATE, MAX_DATE,
} from './date-parser.js';
