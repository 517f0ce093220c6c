import { describe, expect, it } from 'vitest';
import { isOriginAllowed } from './cors.middleware.js';

const ALLOWED = ['http://localhost:3000', 'https://example.org'];

describe('isOriginAllowed', () => {
  it('accepts any localhost port', () => {
    expect(isOriginAllowed('http://localhost:5173', ALLOWED)).toBe(true);
  });

  it('accepts the origin and its subdomains', () => {
    expect(isOriginAllowed('https://example.org', ALLOWED)).toBe(true);
    expect(isOriginAllowed('https://app.example.org', ALLOWED)).toBe(true);
  });

  it('rejects other origins', () => {
    expect(isOriginAllowed('https://example.org.evil.test', ALLOWED)).toBe(false);
    expect(isOriginAllowed('http://example.org', ALLOWED)).toBe(false);
  });
});
