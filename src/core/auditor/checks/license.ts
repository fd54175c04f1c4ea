/**
 * @arch patternloom.core.domain
 * @intent:stateless
 *
 * License check: restrictive licenses and copyleft/permissive mixes.
 */
import {
  isCopyleftLicense,
  isPermissiveLicense,
  isRestrictiveLicense,
} from '../../catalog/index.js';
import type { AuditCheck, AuditContext, AuditFinding } from '../types.js';

export const licenseCheck: AuditCheck = {
  id: 'license',
  name: 'License Check',
  category: 'license',
  check({ pattern }: AuditContext): AuditFinding[] {
    const findings: AuditFinding[] = [];

    // License string -> component names, in first-seen order
    const byLicense = new Map<string, string[]>();
    for (const { component } of pattern.components) {
      if (!component.license) continue;
      const names = byLicense.get(component.license) ?? [];
      names.push(component.name);
      byLicense.set(component.license, names);
    }

    for (const [license, names] of byLicense) {
      if (isRestrictiveLicense(license)) {
        findings.push({
          category: 'license',
          severity: 'warning',
          components: names,
          message: `Restrictive license detected: ${license}`,
          recommendation: 'Consider open source alternatives with permissive licenses',
          evidence: `Affects: ${names.join(', ')}`,
        });
      }
    }

    const licenses = [...byLicense.keys()];
    const hasRestrictive = licenses.some(
      (license) => isCopyleftLicense(license) || isRestrictiveLicense(license)
    );
    const hasPermissive = licenses.some(isPermissiveLicense);
    if (hasRestrictive && hasPermissive && licenses.length > 1) {
      findings.push({
        category: 'license',
        severity: 'warning',
        components: [...byLicense.values()].flat(),
        message: 'Potential GPL license contamination risk',
        recommendation: 'Review license compatibility or isolate GPL components',
        evidence: `Mixed licenses: ${licenses.join(', ')}`,
      });
    }

    return findings;
  },
};
