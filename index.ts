#!/usr/bin/env node
import { main } from "./lib/calendar_merger.js";
import { ConfigLoadError } from "./lib/config/schema.js";

try {
  await main();
} catch (error) {
  if (error instanceof ConfigLoadError) {
    console.error(`ERROR: ${error.message}`);
    process.exitCode = 2;
  } else {
    console.error("Fatal error during calendar merge:", error);
    process.exitCode = 1;
  }
}
