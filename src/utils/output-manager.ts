/**
 * Centralized Output Management System
 * ALL console output must go through this module
 */

import { promises as fs, createWriteStream } from 'fs';
import { dirname } from 'path';
import { LOG_FILE_PATH, VERBOSITY } from '../config/constants.js';

// ANSI color codes
export const LOG_COLOR = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m'
};

export function colorize(text: string, color: keyof typeof LOG_COLOR): string {
  return `${LOG_COLOR[color]}${text}${LOG_COLOR.reset}`;
}

export type VerbosityLevel = 'minimal' | 'normal' | 'verbose';

type MessageType = 'error' | 'warn' | 'info' | 'success' | 'debug';

/** Anything text can be written to: process streams, or a collector in tests */
export interface TextSink {
  write(text: string): unknown;
}

export interface OutputSinks {
  stdout: TextSink;
  stderr: TextSink;
}

/**
 * FileLogger for detailed file logging
 */
class FileLogger {
  private logPath: string;
  private writeStream: NodeJS.WritableStream | null = null;
  private closing: boolean = false;

  constructor(logPath: string) {
    this.logPath = logPath;
  }

  async initialize(): Promise<void> {
    await fs.mkdir(dirname(this.logPath), { recursive: true });
    this.writeStream = createWriteStream(this.logPath, { flags: 'a' });
  }

  log(level: string, message: string): void {
    if (!this.writeStream || this.closing) return;

    const timestamp = new Date().toISOString();
    this.writeStream.write(`[${timestamp}] [${level}] ${message}\n`);
  }

  async close(): Promise<void> {
    this.closing = true;
    return new Promise((resolve) => {
      if (this.writeStream) {
        this.writeStream.end(() => {
          this.writeStream = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}

/**
 * Centralized Output Manager
 * This is the ONLY class that should write to stdout/stderr
 */
export class OutputManager {
  private static instance: OutputManager | null = null;

  private fileLogger: FileLogger | null = null;
  private verbosityLevel: VerbosityLevel = 'normal';
  private currentOperation: string = '';
  private sinks: OutputSinks | null = null;

  // Singleton pattern
  private constructor() {
    this.setVerbosity(VERBOSITY);
  }

  static getInstance(): OutputManager {
    if (!OutputManager.instance) {
      OutputManager.instance = new OutputManager();
    }
    return OutputManager.instance;
  }

  // ========== Initialization ==========

  async initialize(operation: string): Promise<void> {
    this.currentOperation = operation;
    this.setVerbosity(VERBOSITY);

    if (LOG_FILE_PATH && !this.fileLogger) {
      this.fileLogger = new FileLogger(LOG_FILE_PATH);
      await this.fileLogger.initialize();
    }

    this.fileLogger?.log('INFO', `Starting ${operation} command`);
    this.fileLogger?.log('INFO', `Verbosity level: ${this.verbosityLevel}`);
  }

  async close(): Promise<void> {
    if (!this.fileLogger) return;
    this.fileLogger.log('INFO', `Finished ${this.currentOperation} command`);
    await this.fileLogger.close();
    this.fileLogger = null;
  }

  setVerbosity(level: string): void {
    if (level === 'minimal' || level === 'normal' || level === 'verbose') {
      this.verbosityLevel = level;
    } else if (level === 'debug' || level === 'trace') {
      this.verbosityLevel = 'verbose';
    } else if (level === 'error' || level === 'warn') {
      this.verbosityLevel = 'minimal';
    }
  }

  /**
   * Send output somewhere other than the process streams; null restores them.
   */
  setSinks(sinks: OutputSinks | null): void {
    this.sinks = sinks;
  }

  // ========== Core Output Methods (ONLY place that writes to console) ==========

  private writeStdout(text: string): void {
    (this.sinks?.stdout ?? process.stdout).write(text);
    this.fileLogger?.log('OUTPUT', text.replace(/\n/g, '\\n'));
  }

  private writeStderr(text: string): void {
    (this.sinks?.stderr ?? process.stderr).write(text);
    this.fileLogger?.log('ERROR_OUTPUT', text.replace(/\n/g, '\\n'));
  }

  // stdout carries command results only; every status message goes to stderr
  private outputMessage(type: MessageType, message: string): void {
    switch (type) {
      case 'error':
        this.writeStderr(colorize(`✗ ${message}`, 'red') + '\n');
        break;
      case 'warn':
        this.writeStderr(colorize(`⚠️  ${message}`, 'yellow') + '\n');
        break;
      case 'info':
        if (this.verbosityLevel !== 'minimal') {
          this.writeStderr(colorize(`ℹ ${message}`, 'cyan') + '\n');
        }
        break;
      case 'success':
        if (this.verbosityLevel !== 'minimal') {
          this.writeStderr(colorize(`✓ ${message}`, 'green') + '\n');
        }
        break;
      case 'debug':
        if (this.verbosityLevel === 'verbose') {
          this.writeStderr(colorize(`[DEBUG] ${message}`, 'dim') + '\n');
        } else {
          this.fileLogger?.log('DEBUG', message);
        }
        break;
    }
  }

  // ========== Public Logging API ==========

  info(message: string): void {
    this.outputMessage('info', message);
  }

  warn(message: string): void {
    this.outputMessage('warn', message);
  }

  error(message: string): void {
    this.outputMessage('error', message);
  }

  success(message: string): void {
    this.outputMessage('success', message);
  }

  debug(message: string): void {
    this.outputMessage('debug', message);
  }

  /**
   * Raw line to stdout, no prefix and no verbosity filtering.
   * Command results (tables, license records) go through here.
   */
  writeLine(text: string = ''): void {
    this.writeStdout(text + '\n');
  }

  /**
   * Raw line to stderr, used by the error display.
   */
  writeErrorLine(text: string = ''): void {
    this.writeStderr(text + '\n');
  }
}

export const output = OutputManager.getInstance();
