#!/usr/bin/env tsx

/**
 * Statically analyzes contract files, in the order given, against one
 * shared database: later contracts may call and use traits of earlier ones
 */

import { handleCheckCommand } from "../src/cli/index.js";

await handleCheckCommand();
