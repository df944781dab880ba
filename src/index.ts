/**
 * Entry point for GitHub Action execution.
 *
 * Imports and invokes main run() function.
 */

import { run } from "./main";

void run();
