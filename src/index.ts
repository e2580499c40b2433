#!/usr/bin/env node
/**
 * librarian-env CLI entry point.
 */
import { createProgram } from "./cli.js";

await createProgram().parseAsync();
