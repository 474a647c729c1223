export type { ProcessContext, DialogueContext } from './types.js';
export { responderFor, careTeamRoster } from './types.js';
export { timelineProcess } from './timeline.js';
export {
  diagnosticProcess,
  exerciseRefreshProcess,
  travelProcess,
  drawLabResults,
} from './periodic.js';
export { wearableStreamProcess, refreshWearables, ILLNESS_VITAL_MODIFIER } from './wearable-stream.js';
export type { WearableReading } from './wearable-stream.js';
export {
  healthIssuesProcess,
  checkHealthIssues,
  onsetProbability,
  currentFactors,
  HEALTH_ISSUE_CATALOG,
  LOW_RECOVERY_THRESHOLD,
} from './health-issues.js';
export type {
  HealthIssueKind,
  HealthCheckResult,
  HealthIssueOnset,
  TriggeringFactors,
} from './health-issues.js';
export { milestoneProcess, MilestoneDetector } from './milestones.js';
export type { Milestone, MilestoneKind } from './milestones.js';
export {
  proactiveTriggerProcess,
  ProactiveTriggerResolver,
  responderRoleForIssue,
} from './proactive-triggers.js';
export type { TriggerBranch, TriggerDecision } from './proactive-triggers.js';
export { memberProcess, selectMemberMode, replyToMessage, initiateConversation } from './member.js';
export type { MemberMode } from './member.js';
