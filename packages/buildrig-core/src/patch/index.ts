export { applyPatchTree, walkDir } from './patch-applier.js';
export type { PatchTreeOptions, PatchTreeResult } from './patch-applier.js';
