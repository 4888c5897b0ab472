#!/usr/bin/env tsx
/**
 * CLI entry point for splitdock.
 *
 * Usage:
 *   splitdock show|list|validate [--file <path>]
 *   splitdock add <id> [--title t] [--content ref] [--target id] [--direction right] [--min-size px]
 *   splitdock remove <id> | ratio <splitId> <ratio> | min-size <px>
 *   splitdock snapshot save|load|list|delete [name]
 *   splitdock serve [--port 3000]
 */

import { createProgram } from "./lib/cli-program";

await createProgram().parseAsync();
