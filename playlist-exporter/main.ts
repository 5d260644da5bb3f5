#!/usr/bin/env tsx
import 'dotenv/config';
import run from './cli';

process.exitCode = await run(process.argv.slice(2));
