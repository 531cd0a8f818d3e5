/**
 * CLI Entry Point Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Command } from 'commander';

// Mock the command modules before importing
vi.mock('./commands/db.js', () => ({
  dbCommands: vi.fn(() => new Command('db').description('Database management commands')),
}));

import { dbCommands } from './commands/db.js';
import { createProgram, VERSION } from './program.js';

describe('CLI Entry Point', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('Command Registration', () => {
    it('registers db commands', () => {
      const program = createProgram();
      expect(dbCommands).toHaveBeenCalledTimes(1);
      expect(program.commands.map(c => c.name())).toEqual(['db']);
    });
  });

  describe('Program Structure', () => {
    it('creates main program with correct name', () => {
      expect(createProgram().name()).toBe('quarry');
    });

    it('creates main program with description', () => {
      expect(createProgram().description().length).toBeGreaterThan(0);
    });

    it('creates main program with version', () => {
      expect(createProgram().version()).toBe(VERSION);
    });

    it('declares global options', () => {
      const options = createProgram().options.map(o => o.long);
      expect(options).toContain('--db-path');
      expect(options).toContain('--verbose');
      expect(options).toContain('--log-format');
    });

    it('uses -v as the verbose short flag', () => {
      const verbose = createProgram().options.find(o => o.long === '--verbose');
      expect(verbose?.short).toBe('-v');
    });
  });
});
