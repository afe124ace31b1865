/**
 * Jest setup file.
 *
 * Loads reflect-metadata before any decorated class, and replaces Jest's
 * console with Node's native one so log lines print without a stack trace
 * each:
 *
 *   console.log
 *     My log message
 *
 *       at Object.<anonymous> (file.ts:123:45)
 *
 * becomes
 *
 *   My log message
 */
import 'reflect-metadata';
import nodeConsole from 'console';

global.console = nodeConsole;
