#!/usr/bin/env node
import { run } from './app'

run().then(code => {
  process.exitCode = code
})
