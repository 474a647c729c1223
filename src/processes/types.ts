import type { SimulationSettings } from '../config/index.js';
import type { RandomSource } from '../core/random.js';
import type { Scheduler } from '../core/scheduler.js';
import type { SimulationState } from '../core/simulation-state.js';
import type { ActionExecutor } from '../dialogue/index.js';
import type { ResponseGenerator, ResponseRouter } from '../ports/index.js';
import type { CareRole, Logger } from '../types/index.js';
import { CARE_ROLES } from '../types/index.js';

/**
 * Everything a collaborator-free process needs.
 */
export interface ProcessContext {
  state: SimulationState;
  scheduler: Scheduler;
  rng: RandomSource;
  settings: SimulationSettings;
  logger: Logger;
}

/**
 * Context for processes that talk to collaborators.
 */
export interface DialogueContext extends ProcessContext {
  generator: ResponseGenerator;
  router: ResponseRouter;
  actionExecutor: ActionExecutor;
}

/**
 * Identity of the responder configured for a role.
 */
export function responderFor(settings: SimulationSettings, role: CareRole): string {
  return settings.careTeam[role].name;
}

/**
 * All care-team identities, in role order.
 */
export function careTeamRoster(settings: SimulationSettings): string[] {
  return CARE_ROLES.map((role) => settings.careTeam[role].name);
}
