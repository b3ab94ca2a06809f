import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../../core/monitor/errors.js';
import { createGitHubClient, parseRepo } from '../client.js';

describe('GitHub Client', () => {
  describe('parseRepo', () => {
    it('should parse "owner/repo" format', () => {
      expect(parseRepo('acme/shop')).toEqual({ owner: 'acme', repo: 'shop' });
    });

    it('should parse full GitHub URL', () => {
      expect(parseRepo('https://github.com/acme/shop')).toEqual({ owner: 'acme', repo: 'shop' });
    });

    it('should parse GitHub URL with .git extension', () => {
      expect(parseRepo('https://github.com/acme/shop.git')).toEqual({ owner: 'acme', repo: 'shop' });
    });

    it('should throw error for empty input', () => {
      expect(() => parseRepo('')).toThrow('Repository input is empty');
    });

    it('should throw error for invalid format', () => {
      expect(() => parseRepo('just-a-string')).toThrow('Could not parse repository from');
    });

    it('should throw error for incomplete owner/repo', () => {
      expect(() => parseRepo('owner/')).toThrow('Invalid repository format');
    });

    it('should reject extra path segments', () => {
      expect(() => parseRepo('acme/shop/tree')).toThrow(ConfigError);
    });
  });

  describe('createGitHubClient', () => {
    it('should throw error if the token is missing', () => {
      expect(() => createGitHubClient('')).toThrow('GITHUB_TOKEN environment variable is not set');
    });

    it('should return a client for a token', () => {
      expect(createGitHubClient('test-token').issues).toBeDefined();
    });
  });
});
