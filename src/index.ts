#!/usr/bin/env node
import { argv, env } from "node:process";
import { run } from "./main.js";

process.exitCode = await run(argv.slice(2), env);
