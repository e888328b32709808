export type * from './coin';
export type * from './bundle';
export { ConditionOpcode, type Condition, type ConditionType } from './condition';
