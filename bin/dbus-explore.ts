#!/usr/bin/env node

import { hideBin } from "yargs/helpers"

import { run } from "../lib/cli"

run(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err) => {
    console.error(err)
    process.exit(1)
  })
