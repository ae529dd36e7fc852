export { setHeaderFlag, setHeaderFlagInFile, LARGE_ADDRESS_AWARE_LAYOUT } from './flag-patcher.js';
export type { FlagPatchOutcome, HeaderFlagLayout } from './flag-patcher.js';
