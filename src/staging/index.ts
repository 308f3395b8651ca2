export {
  PendingEditStore,
  PersistedPendingEditSchema,
  fromPersisted,
  toPersisted,
} from './pending.js';
export type { PendingEdit, PendingEditStoreOptions, PersistedPendingEdit } from './pending.js';
export {
  EditProposer,
  DETERMINISTIC_RATIONALE,
  applySimpleInstruction,
  parseInstruction,
  parseProducedChanges,
} from './proposer.js';
export type {
  EditProducer,
  EditProposerOptions,
  EditRequest,
  ProducedChanges,
  SourceFile,
} from './proposer.js';
