/**
 * @arch patternloom.core.domain
 *
 * A candidate or evolved architecture: ordered (component, role) slots,
 * a tag set and the notes left by evolutions. Metrics are not stored here;
 * see computeMetrics.
 */
import { hasCapability, type Capability, type Component, type Intent } from '../catalog/index.js';
import type { PatternComponent } from './types.js';

export interface PatternInit {
  name: string;
  description?: string;
  intent?: Intent;
  tags?: readonly string[];
  notes?: readonly string[];
}

export class Pattern {
  name: string;
  description: string;
  readonly intent?: Intent;

  private readonly slots: PatternComponent[] = [];
  private readonly tagSet = new Set<string>();
  private readonly noteList: string[] = [];

  constructor(init: PatternInit) {
    this.name = init.name;
    this.description = init.description ?? '';
    this.intent = init.intent;
    this.addTags(...(init.tags ?? []));
    this.noteList.push(...(init.notes ?? []));
  }

  /** Slots in addition order */
  get components(): readonly PatternComponent[] {
    return this.slots;
  }

  /** Tags in first-added order, without duplicates */
  get tags(): string[] {
    return [...this.tagSet];
  }

  get notes(): readonly string[] {
    return this.noteList;
  }

  get size(): number {
    return this.slots.length;
  }

  addComponent(component: Component, role: string): void {
    this.slots.push({ component, role });
  }

  /**
   * Remove the first slot holding the named component.
   */
  removeComponent(name: string): boolean {
    const index = this.slots.findIndex((slot) => slot.component.name === name);
    if (index === -1) return false;
    this.slots.splice(index, 1);
    return true;
  }

  hasComponent(name: string): boolean {
    return this.slots.some((slot) => slot.component.name === name);
  }

  hasCapability(capability: Capability): boolean {
    return this.slots.some((slot) => hasCapability(slot.component, capability));
  }

  componentsWithCapability(capability: Capability): Component[] {
    return this.slots
      .filter((slot) => hasCapability(slot.component, capability))
      .map((slot) => slot.component);
  }

  componentNames(): string[] {
    return this.slots.map((slot) => slot.component.name);
  }

  addTags(...tags: string[]): void {
    for (const tag of tags) {
      this.tagSet.add(tag);
    }
  }

  addNotes(...notes: string[]): void {
    this.noteList.push(...notes);
  }

  /**
   * Copy with independent slot, tag and note lists. Components stay shared.
   */
  clone(overrides: Partial<Pick<PatternInit, 'name' | 'description'>> = {}): Pattern {
    const copy = new Pattern({
      name: overrides.name ?? this.name,
      description: overrides.description ?? this.description,
      intent: this.intent,
      tags: this.tags,
      notes: this.noteList,
    });
    for (const slot of this.slots) {
      copy.addComponent(slot.component, slot.role);
    }
    return copy;
  }
}
