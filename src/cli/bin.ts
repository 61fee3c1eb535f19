#!/usr/bin/env node
import { initLogger } from '../logger.js'
import { run } from './run.js'

await initLogger()
process.exitCode = await run(process.argv.slice(2))
