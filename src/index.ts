export { Arguments, argskwargs } from './arguments';
export { partial } from './partial';
export type { PartialFunction } from './partial';
export { ArgumentsStateError, ConstructionDeniedError } from './errors';
export { isArgumentsState } from './guards';
export { isDeepEqual } from './equality';
export type { SelfComparable } from './equality';
export { formatValue, represent } from './display';
export type { Representable } from './display';
export type {
  ArgumentsState,
  MergeNamed,
  Named,
  NoNamed,
  Positionals,
  Target
} from './types';
