#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from './runCli.js';

dotenv.config();

process.exitCode = await runCli(process.argv.slice(2), process.env);
