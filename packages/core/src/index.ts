// Types
export { TaskState, TaskStateName, assertNever } from './types/index.js';
export type { TaskId, CalendarDate, Task, FrozenTask, UnfrozenTask } from './types/index.js';

// Errors
export {
  KelvinError, InvalidDateSpecError, InvalidTransitionError, TaskNotFoundError,
  StorageError, ConfigError, ValidationError, describeIssues,
} from './errors.js';

// Parsers
export { resolveDateSpec, formatDate, today, addDays, isCalendarDate, MIN_DATE, MAX_DATE } from './parsers/index.js';

// Lifecycle
export { warm, burn, cool, freeze, applyTransition, TRANSITION_SOURCES, sweepThawed } from './lifecycle/index.js';
export type { Transition, TransitionKind } from './lifecycle/index.js';

// Store
export { TaskStore } from './store/index.js';

// Config
export {
  loadConfig, parseConfig, defaultConfig, resolveDataFile, expandHome,
  getDefaultConfigPath, getConfigDir, getDefaultDataFile, KelvinConfigSchema, DEFAULT_THAW_DAYS,
} from './config/index.js';
export type { KelvinConfig } from './config/index.js';

// Queries
export * from './queries/index.js';
