#!/usr/bin/env -S node --import tsx
import { runCli } from "./cli.js"

process.exit(await runCli(process.argv.slice(2)))
