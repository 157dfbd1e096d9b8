#!/usr/bin/env node
/**
 * bin/resforge.ts — entry point for the `resforge` CLI command.
 */

import { main } from '../main.js'

await main()
