export { BatchProcessor } from './batch-processor.js';
export type { BatchProcessorDeps, BatchPreviewOptions, IngestOptions } from './batch-processor.js';
export { CleaningPipeline, draftRuleId, toDraftRule } from './cleaning-pipeline.js';
export type { CleaningPipelineDeps, TextPreview, TextPreviewOptions } from './cleaning-pipeline.js';
export {
  assessRisk,
  riskLevelFor,
  changeKey,
  fingerprintChangeSet,
  verifyFingerprint,
  LOW_CONFIDENCE_THRESHOLD,
  APPROVAL_SCORE_THRESHOLD,
} from './change-set.js';
export type {
  ApplyFailure,
  ApplyFailureCause,
  ApplyOptions,
  ApplyRequest,
  ApplyResult,
  ChangeSet,
  ChangeSetOutcome,
  ChangeSetSummary,
  CompileFailure,
  PreviewOptions,
  RiskAssessment,
  RuleCount,
} from './types.js';
