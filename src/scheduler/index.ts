export { AdaptiveInterval } from "./adaptive-interval.js";
export { Scheduler, type SchedulerOptions, type SchedulerSettings } from "./scheduler.js";
