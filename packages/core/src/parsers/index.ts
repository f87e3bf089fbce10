export { parseDate, parseIsoDate, isCalendarDate, formatDate, addDays } from './date-parser.js';
