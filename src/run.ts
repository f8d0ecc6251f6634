#!/usr/bin/env node
import { startCli } from './cli.js';

startCli();
