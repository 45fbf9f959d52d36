#!/usr/bin/env tsx
import { runCli } from "./index";

const status = await runCli(process.argv);
if (status !== 0) process.exitCode = status;
