export { Reconciler, classifyError, type ReconcilerOptions } from './reconciler.js';
export {
  computePlan,
  diffCard,
  isInList,
  isSameDue,
  normalizeListName,
  type Plan,
  type PlanInput,
  type Adoption,
} from './plan.js';
export { formatMarker, parseMarker, withMarker, stripMarker } from './marker.js';
export { formatRunResult } from './summary.js';
export type {
  ListRef,
  CardContent,
  ChecklistContent,
  CardPatch,
  SourceRecord,
  SourceSnapshot,
  DestinationCard,
  CreatedCard,
  SourceAdapter,
  DestinationAdapter,
  ArchiveReason,
  CreateChange,
  UpdateChange,
  ArchiveChange,
  PlannedChange,
  ErrorOperation,
  ErrorRecord,
  RunResult,
  RunnableJob,
} from './types.js';
