import type { Scheduler } from "../coro/Scheduler";
import type { Registry } from "../ecs/Registry";
import type { Logger } from "../log/Logger";

/** What every grid routine is handed instead of reaching for globals. */
export type SimContext = {
    scheduler: Scheduler;
    registry: Registry;
    log: Logger;
};
