import { beforeEach } from "vitest";
import { Logger, LogLevel } from "../src/utils/Logger.js";

beforeEach(() => {
  Logger.configure({
    enableConsole: false,
    minLevel: LogLevel.INFO,
    maxLogEntries: 1000,
  });
  Logger.clearLogs();
});
