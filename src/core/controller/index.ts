/**
 * Update controller module.
 *
 * The stateful facade applications drive: check, download, pause,
 * resume, cancel and install, plus periodic scheduling.
 */
export * from './types.js';
export { UpdateController, defaultArtifactName } from './controller.js';
export {
    UpdateScheduler,
    DEFAULT_COOLDOWN_MS,
    type UpdateSchedulerOptions,
    type StartOptions,
    type ScheduledCheckOptions,
} from './scheduler.js';
