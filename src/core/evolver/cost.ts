/**
 * @arch patternloom.core.domain
 * @intent:stateless
 *
 * Relative operating-cost heuristic (lower is cheaper).
 */
import {
  componentKey,
  isPermissiveLicense,
  isRestrictiveLicense,
  type Component,
} from '../catalog/index.js';
import type { Pattern } from '../patterns/index.js';
import { RESOURCE_INTENSIVE_COMPONENTS } from './tables.js';

const BASE_COST = 1.0;
const RESTRICTIVE_FACTOR = 1.5;
const RESOURCE_INTENSIVE_FACTOR = 1.3;
const PERMISSIVE_FACTOR = 0.9;
const PER_COMPONENT_OVERHEAD = 0.05;

const resourceIntensive = new Set(RESOURCE_INTENSIVE_COMPONENTS.map(componentKey));

export function componentCost(component: Component): number {
  let cost = BASE_COST;
  if (isRestrictiveLicense(component.license)) cost *= RESTRICTIVE_FACTOR;
  if (resourceIntensive.has(componentKey(component.name))) cost *= RESOURCE_INTENSIVE_FACTOR;
  if (isPermissiveLicense(component.license)) cost *= PERMISSIVE_FACTOR;
  return cost;
}

/**
 * Mean component cost plus a fixed overhead per component; 0 when empty.
 */
export function patternCost(pattern: Pattern): number {
  const components = pattern.components.map((slot) => slot.component);
  if (components.length === 0) return 0;
  const total = components.reduce((sum, component) => sum + componentCost(component), 0);
  return total / components.length + PER_COMPONENT_OVERHEAD * components.length;
}
