/**
 * @arch patternloom.test.unit
 */
import { describe, it, expect } from 'vitest';
import { detectDomain } from '../../../../src/core/weaver/domains.js';
import { roleForCapability } from '../../../../src/core/weaver/roles.js';

describe('detectDomain', () => {
  it.each([
    ['A personal blog', 'cms'],
    ['Content Management for a newsroom', 'cms'],
    ['Online shop with checkout', 'ecommerce'],
    ['E-Commerce backend', 'ecommerce'],
    ['Real-time analytics', 'analytics'],
    ['Ops dashboard', 'analytics'],
  ])('should detect %j as %s', (description, domain) => {
    expect(detectDomain(description)).toBe(domain);
  });

  it('should let the earlier family win when several match', () => {
    expect(detectDomain('analytics data store')).toBe('ecommerce');
    expect(detectDomain('blog with a shop')).toBe('cms');
  });

  it('should return null without a keyword', () => {
    expect(detectDomain('Python API')).toBeNull();
  });
});

describe('roleForCapability', () => {
  it('should use fixed labels where defined', () => {
    expect(roleForCapability('web_framework')).toBe('Application Framework');
    expect(roleForCapability('cdn')).toBe('CDN');
  });

  it('should fall back to the title-cased capability', () => {
    expect(roleForCapability('vector_db')).toBe('Vector Db');
  });
});
