#!/usr/bin/env node

/* eslint-disable no-console */

import { config as loadEnv } from 'dotenv'
import { runCli } from '../src/cli/cli'

// BENCH_* overrides may live in a local .env file
loadEnv()

runCli().catch((error: unknown) => {
  console.error('edgebench failed:', error instanceof Error ? error.message : error)
  process.exit(1)
})
