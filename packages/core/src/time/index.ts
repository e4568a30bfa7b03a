export * from "./constants";
export { timeframeToMs, startOfUtcDay } from "./time";
