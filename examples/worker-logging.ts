/**
 * Example: wire a backend once, then log from classes and streams.
 *
 * Run with `DEBUG=loghost npx tsx examples/worker-logging.ts`.
 */

import { interval, map, take } from "rxjs";
import {
  configureLogging,
  DebugLogger,
  LEVELED_LOGGER,
  Loggable,
  LogHost,
  loadLoggingSettingsFromEnv,
  logged,
  loggedCatch,
  ServiceRegistry,
} from "../src/index.js";

configureLogging(loadLoggingSettingsFromEnv());
LogHost.useResolver(new ServiceRegistry().registerConstant(LEVELED_LOGGER, new DebugLogger()));

class Worker extends Loggable {
  run(): void {
    this.log().info("starting {0} jobs", 3);

    interval(100)
      .pipe(
        take(3),
        map((n) => {
          if (n === 2) throw new Error(`job ${n} crashed`);
          return n;
        }),
        logged(this, "jobs"),
        loggedCatch<number>(this, undefined, "job stream failed"),
      )
      .subscribe({ complete: () => LogHost.default.info("all jobs settled") });
  }
}

new Worker().run();
