/**
 * @arch patternloom.core.domain
 *
 * License classification shared by the evolver's cost rules and the
 * auditor's license check.
 */

/** Source-available licenses that trigger a permissive substitution. */
export const SOURCE_AVAILABLE_LICENSES = ['SSPL', 'Elastic License', 'Commons Clause'] as const;

/** Licenses flagged by the audit and penalized by the cost heuristic. */
export const RESTRICTIVE_LICENSES = [...SOURCE_AVAILABLE_LICENSES, 'AGPL'] as const;

export const PERMISSIVE_LICENSES = ['MIT', 'BSD', 'Apache 2.0', 'PostgreSQL'] as const;

/**
 * `"Apache-2.0"` -> `"apache 2.0"`, `"BSD-3-Clause"` -> `"bsd 3 clause"`.
 */
function normalizeLicense(license: string): string {
  return license.trim().toLowerCase().replace(/[\s-]+/g, ' ');
}

/**
 * True when the license names one of the listed licenses, either exactly or
 * followed by a version or variant suffix (`AGPL-3.0`, `BSD-2-Clause`).
 */
export function licenseMatches(license: string | undefined, list: readonly string[]): boolean {
  if (!license) return false;
  const normalized = normalizeLicense(license);
  return list.some((entry) => {
    const candidate = normalizeLicense(entry);
    return normalized === candidate || normalized.startsWith(`${candidate} `);
  });
}

export function isRestrictiveLicense(license: string | undefined): boolean {
  return licenseMatches(license, RESTRICTIVE_LICENSES);
}

export function isSourceAvailableLicense(license: string | undefined): boolean {
  return licenseMatches(license, SOURCE_AVAILABLE_LICENSES);
}

export function isPermissiveLicense(license: string | undefined): boolean {
  return licenseMatches(license, PERMISSIVE_LICENSES);
}

/**
 * Any member of the GPL family (GPL, LGPL, AGPL).
 */
export function isCopyleftLicense(license: string | undefined): boolean {
  return license !== undefined && /gpl/i.test(license);
}
