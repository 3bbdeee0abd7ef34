export { MergeEngine, appendNotes } from "./merge-engine"
export { QueryEngine, compareByCreation, PROJECT_PATH_KEY } from "./query-engine"
export { NamePattern, MAX_NAME_PATTERN_LENGTH, MAX_QUANTIFIERS } from "./name-pattern"
export { systemClock } from "./clock"
export type { Clock } from "./clock"
