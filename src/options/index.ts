export type {
  OptionAction,
  OptionType,
  OptionStatus,
  OptionTransaction,
  OptionPosition,
} from "./option-position.js";
export {
  OPTION_ACTIONS,
  OPTION_TYPES,
  OPTION_STATUSES,
  CONTRACT_MULTIPLIER,
  formatOptionSymbol,
} from "./option-position.js";
export { isRollNote, nextStatus, isPastExpiry, projectExpiry } from "./option-lifecycle.js";
export {
  buildOptionPositions,
  calculateOptionPositions,
  capitalRequirement,
} from "./option-positions.js";
export type { OptionBook, OptionPositionOptions } from "./option-positions.js";
