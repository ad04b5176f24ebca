export * from './types';
export { toCalendarDate, toCrimeEvents, toHexCells } from './records';
export { filterCrimeEvents, crimeTypeOptions, dateExtent, toMonth } from './filter';
export { countCrimesByCell, joinGridWithCrimes } from './join';
export { THEMES, FEATURE_THEMES, matchesThreshold } from './themes';
export { OVERALL_GROUP, monthlySeries, aggregateTheme, computeInsight } from './aggregate';
