#!/usr/bin/env node
/**
 * xa CLI Entry Point
 *
 * Execute anything via LLM: prompt-template commands, an interactive
 * ask loop and an LLM-tagged secret store.
 */

import { createProgram } from './program.js'
import { exitWithError } from './errors.js'

createProgram().parseAsync().catch(exitWithError)
