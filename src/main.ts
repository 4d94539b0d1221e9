#!/usr/bin/env node
// src/main.ts
import { main } from './cli.js';

process.exitCode = main(process.argv.slice(2));
