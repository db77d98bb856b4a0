/**
 * Plan Module Index
 */

export { type ScheduleOptions, entryKey, planEntries, schedule, summarizePlan } from "./scheduler.js";
export { SAVED_PLAN_FORMAT_VERSION, parsePlan, renderPlan, serializePlan } from "./render.js";
