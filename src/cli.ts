#!/usr/bin/env node
import { logger } from './logger.js'
import { runCli } from './index.js'

runCli().catch((err) => {
    logger.error(err)
    // Mirror to stderr for visibility in non-MCP contexts
    console.error(err)
    process.exit(1)
})
