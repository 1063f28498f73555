export { Filter } from './Filter';
export type { Service } from './Filter';
export { ResponseWrapper } from './ResponseWrapper';
export { FilterChain } from './FilterChain';
