/**
 * CompactLogger - logging facade used by the commands
 * Redirects all calls to the centralized OutputManager
 */

import { OutputManager, output } from './output-manager.js';
import { getModuleNameFromUrl } from './misc-utils.js';

export class CompactLoggerWrapper {
  private static instance: CompactLoggerWrapper | null = null;
  private outputManager: OutputManager = output;
  public currentCommandName: string = 'unknown-command';
  protected constructor() {}

  static getInstance(): CompactLoggerWrapper {
    if (!CompactLoggerWrapper.instance) {
      CompactLoggerWrapper.instance = new CompactLoggerWrapper();
    }
    return CompactLoggerWrapper.instance;
  }

  /**
   * Start logging for a command. The command name is derived from the caller's module URL:
   * file:///path/to/actions/install-license.js -> install-license
   */
  async initialize(callerUrl: string): Promise<void> {
    this.currentCommandName = getModuleNameFromUrl(callerUrl);
    return this.outputManager.initialize(this.currentCommandName);
  }

  async close(): Promise<void> {
    return this.outputManager.close();
  }

  debug(message: string): void {
    this.outputManager.debug(`[${this.currentCommandName}] ${message}`);
  }

  info(message: string): void {
    this.outputManager.info(message);
  }

  warn(message: string): void {
    this.outputManager.warn(message);
  }

  error(message: string): void {
    this.outputManager.error(message);
  }

  success(message: string): void {
    this.outputManager.success(message);
  }
}

// Export logger instance after class declaration
export const logger = CompactLoggerWrapper.getInstance();
