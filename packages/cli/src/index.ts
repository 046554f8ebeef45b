#!/usr/bin/env tsx
import { run } from "./run";

process.exit(run(process.argv.slice(2), process.env));
