#!/usr/bin/env node
import chalk from 'chalk'
import { describeFailure, run } from './cli/index'

const controller = new AbortController()
process.once('SIGINT', () => controller.abort())

run(process.argv, {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
  signal: controller.signal,
}).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(chalk.red(`Error: ${describeFailure(error)}`))
    process.exitCode = 1
  },
)
