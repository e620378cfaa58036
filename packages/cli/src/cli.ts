#!/usr/bin/env node

/**
 * inikv CLI entry point
 */

import { main } from "./program.js";

process.exitCode = await main(process.argv);
