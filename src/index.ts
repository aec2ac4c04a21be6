#!/usr/bin/env node
import { createProgram } from "./cli.js";

try {
    await createProgram().parseAsync();
} catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
}
