#!/usr/bin/env node
import { startCli } from './cli.js';
import { INSTALL_LICENSE_COMMAND } from './utils/cli-args.js';

startCli(INSTALL_LICENSE_COMMAND);
