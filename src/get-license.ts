#!/usr/bin/env node
import { startCli } from './cli.js';
import { GET_LICENSE_COMMAND } from './utils/cli-args.js';

startCli(GET_LICENSE_COMMAND);
