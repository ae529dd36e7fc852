export { ArchiveRewriter, rewriteArchive } from './archive-rewriter.js';
export type { ArchiveCommitResult, ArchiveRewriterOptions } from './archive-rewriter.js';
