/**
 * @arch patternloom.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  isCopyleftLicense,
  isPermissiveLicense,
  isRestrictiveLicense,
  isSourceAvailableLicense,
  licenseMatches,
} from '../../../../src/core/catalog/licenses.js';

describe('licenseMatches', () => {
  it('should match exact names case-insensitively', () => {
    expect(licenseMatches('mit', ['MIT'])).toBe(true);
  });

  it('should match version and variant suffixes', () => {
    expect(licenseMatches('Apache-2.0', ['Apache 2.0'])).toBe(true);
    expect(licenseMatches('BSD-3-Clause', ['BSD'])).toBe(true);
    expect(licenseMatches('AGPL-3.0', ['AGPL'])).toBe(true);
  });

  it('should not match a different license that shares a prefix', () => {
    expect(licenseMatches('MITRE', ['MIT'])).toBe(false);
  });

  it('should not match a missing license', () => {
    expect(licenseMatches(undefined, ['MIT'])).toBe(false);
  });
});

describe('license classes', () => {
  it('should treat source-available licenses as restrictive', () => {
    expect(isSourceAvailableLicense('SSPL')).toBe(true);
    expect(isRestrictiveLicense('SSPL')).toBe(true);
    expect(isRestrictiveLicense('Elastic License')).toBe(true);
  });

  it('should treat AGPL as restrictive but not source-available', () => {
    expect(isRestrictiveLicense('AGPL')).toBe(true);
    expect(isSourceAvailableLicense('AGPL')).toBe(false);
  });

  it('should recognize permissive licenses', () => {
    expect(isPermissiveLicense('PostgreSQL')).toBe(true);
    expect(isPermissiveLicense('GPL')).toBe(false);
  });

  it('should treat the GPL family as copyleft', () => {
    expect(isCopyleftLicense('GPL')).toBe(true);
    expect(isCopyleftLicense('LGPL-2.1')).toBe(true);
    expect(isCopyleftLicense('AGPL')).toBe(true);
    expect(isCopyleftLicense('MIT')).toBe(false);
    expect(isCopyleftLicense(undefined)).toBe(false);
  });
});
