export { runCommandAction } from './action.js';
export {
  increaseVerbosity,
  parseNonEmptyOption,
  type NonEmptyOption,
} from './options.js';
