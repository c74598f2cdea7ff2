export * from "./Errors";
export * from "./coro/Types";
export * from "./coro/EventKey";
export * from "./coro/TimedQueue";
export * from "./coro/Task";
export * from "./coro/Scheduler";
export * from "./coro/Awaiters";
export { activeScheduler } from "./coro/ActiveScheduler";
export * from "./ecs/Types";
export * from "./ecs/Registry";
export * from "./log/Logger";
export * from "./config/Config";
export * from "./sim/Context";
export * from "./sim/Events";
export * from "./sim/DataRecorder";
export * from "./sim/Random";
export * from "./sim/FrequencySystem";
export * from "./sim/ProtectionSystem";
export * from "./sim/GridTasks";
export * from "./sim/VoltageControl";
export * from "./sim/Scenario";
