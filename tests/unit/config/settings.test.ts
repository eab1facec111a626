import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  buildSettings,
  loadSettings,
  loadYamlConfig,
  requireActionContext,
} from '../../../src/config/settings.js';
import { ConfigurationError } from '../../../src/errors.js';
import { makeSettings } from '../../helpers/fixtures.js';

describe('config/settings', () => {
  describe('buildSettings', () => {
    it('should apply defaults to an empty config', () => {
      const settings = buildSettings({}, {});

      expect(settings.analysis).toEqual({
        maxFilesFullAnalysis: 50,
        maxDiffLinesPerFile: 1000,
        enableSecurityCheck: true,
        enablePerformanceCheck: true,
        enableBreakingChangeCheck: true,
        enableTestCoverageCheck: true,
      });
      expect(settings.comment).toEqual({
        includeSummary: true,
        includeKeyFiles: true,
        includeRisks: true,
        collapseFileList: true,
        maxKeyFiles: 10,
      });
      expect(settings.ai).toEqual({ model: 'claude-sonnet-4-20250514', maxTokens: 4096, temperature: 0.3 });
      expect(settings.prNumber).toBe(0);
      expect(settings.githubToken).toBe('');
    });

    it('should read file values and host variables', () => {
      const settings = buildSettings(
        { analysis: { max_files_full_analysis: 5 }, comment: { collapse_file_list: false } },
        { GITHUB_TOKEN: 'test-token', GITHUB_REPOSITORY: 'acme/widgets', GITHUB_EVENT_NUMBER: '12' }
      );

      expect(settings.analysis.maxFilesFullAnalysis).toBe(5);
      expect(settings.comment.collapseFileList).toBe(false);
      expect(settings.githubToken).toBe('test-token');
      expect(settings.repository).toBe('acme/widgets');
      expect(settings.prNumber).toBe(12);
    });

    it('should let environment overrides win over the file', () => {
      const settings = buildSettings(
        { analysis: { max_files_full_analysis: 5, enable_security_check: true } },
        {
          PATCHWATCH_MAX_FILES: '8',
          PATCHWATCH_MAX_DIFF_LINES: '200',
          PATCHWATCH_ENABLE_SECURITY: 'FALSE',
          PATCHWATCH_ENABLE_PERFORMANCE: 'True',
          PATCHWATCH_ENABLE_BREAKING: 'yes',
        }
      );

      expect(settings.analysis).toEqual({
        maxFilesFullAnalysis: 8,
        maxDiffLinesPerFile: 200,
        enableSecurityCheck: false,
        enablePerformanceCheck: true,
        enableBreakingChangeCheck: false,
        enableTestCoverageCheck: true,
      });
    });

    it('should ignore non-integer numeric overrides', () => {
      const settings = buildSettings({}, { PATCHWATCH_MAX_FILES: 'lots', PATCHWATCH_MAX_DIFF_LINES: '1.5' });

      expect(settings.analysis.maxFilesFullAnalysis).toBe(50);
      expect(settings.analysis.maxDiffLinesPerFile).toBe(1000);
    });

    it('should reject values below their bounds', () => {
      expect(() => buildSettings({ analysis: { max_diff_size_per_file: 50 } }, {})).toThrow(ConfigurationError);
      expect(() => buildSettings({}, { PATCHWATCH_MAX_FILES: '0' })).toThrow(/analysis\.max_files_full_analysis/);
      expect(() => buildSettings({ ai: { temperature: 2 } }, {})).toThrow(/ai\.temperature/);
    });
  });

  describe('loadYamlConfig', () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), 'patchwatch-config-'));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should return an empty config for a missing file', () => {
      expect(loadYamlConfig(join(dir, 'missing.yml'))).toEqual({});
    });

    it('should return an empty config for unparsable YAML', () => {
      const path = join(dir, 'broken.yml');
      writeFileSync(path, 'analysis: [unclosed\n');

      expect(loadYamlConfig(path)).toEqual({});
    });

    it('should return an empty config for a scalar document', () => {
      const path = join(dir, 'scalar.yml');
      writeFileSync(path, 'just a string\n');

      expect(loadYamlConfig(path)).toEqual({});
    });

    it('should load settings from a file', () => {
      const path = join(dir, 'patchwatch.yml');
      writeFileSync(path, 'analysis:\n  max_files_full_analysis: 5\ncomment:\n  max_key_files: 3\n');

      const settings = loadSettings(path, { PATCHWATCH_MAX_FILES: '8' });

      expect(settings.analysis.maxFilesFullAnalysis).toBe(8);
      expect(settings.comment.maxKeyFiles).toBe(3);
    });
  });

  describe('requireActionContext', () => {
    it('should split the repository slug', () => {
      expect(requireActionContext(makeSettings())).toEqual({
        owner: 'acme',
        repo: 'widgets',
        pullNumber: 7,
        token: 'test-token',
      });
    });

    it('should require a token', () => {
      expect(() => requireActionContext(makeSettings({ githubToken: '' }))).toThrow(/GITHUB_TOKEN/);
    });

    it('should require an owner/repo slug', () => {
      expect(() => requireActionContext(makeSettings({ repository: 'widgets' }))).toThrow(/owner\/repo/);
      expect(() => requireActionContext(makeSettings({ repository: '' }))).toThrow(/GITHUB_REPOSITORY/);
    });

    it('should require a PR number', () => {
      expect(() => requireActionContext(makeSettings({ prNumber: 0 }))).toThrow(/GITHUB_EVENT_NUMBER/);
    });
  });
});
