export { TypeFilter } from './TypeFilter';
export { DateRangePicker } from './DateRangePicker';
