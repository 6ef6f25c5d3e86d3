export { Reconciler } from './reconciler';
export type { ReconcilerDependencies, ReconcileResult } from './reconciler';
export { ReconcileError } from './reconciler.errors';
export { deriveRow, deriveRows } from './derive_rows';
