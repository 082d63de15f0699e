import { describe, it, expect } from 'vitest';
import { collapseWhitespace, getBasename, getExtension, maskUrl } from './path.js';

describe('path utilities', () => {
  it('lower-cases extensions and keeps the dot', () => {
    expect(getExtension('/media/Movie.MKV')).toBe('.mkv');
    expect(getExtension('/media/README')).toBe('');
  });

  it('strips only the last extension from the basename', () => {
    expect(getBasename('/media/Show.S01E01.mkv')).toBe('Show.S01E01');
  });

  it('collapses whitespace runs and trims', () => {
    expect(collapseWhitespace('  Movie   Name \t 2020 ')).toBe('Movie Name 2020');
    expect(collapseWhitespace('   ')).toBe('');
  });

  it('masks a long url after 30 characters', () => {
    const url = 'https://discord.com/api/webhooks/123/test-secret';
    expect(maskUrl(url)).toBe('https://discord.com/api/webhoo...');
    expect(maskUrl('https://short.example')).toBe('https://short.example');
  });
});
