export type {
  ArgumentsState,
  Named,
  NoNamed,
  Positionals,
  Target
} from './primitives';
export type { MergeNamed, Simplify } from './types-helper';
