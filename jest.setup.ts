/**
 * Jest setup file.
 *
 * Loads reflect-metadata before any decorated class, and replaces Jest's
 * console (which prints a stack trace under every line) with a plain Node
 * console.
 */
import 'reflect-metadata';

global.console = new console.Console({ stdout: process.stdout, stderr: process.stderr });
