#!/usr/bin/env node
import dotenv from "dotenv";
import { runCli } from "./cli.js";

dotenv.config();

/**
 * Main application entry point.
 */
process.exitCode = await runCli(process.argv.slice(2));
