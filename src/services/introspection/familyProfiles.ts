/**
 * Family Profile Registry
 *
 * Knowledge about named model lineages (default sampling values, parameters
 * that misbehave or excel). Profiles are data: the bundled set lives in
 * data/familyProfiles.json and hosts can layer their own files on top.
 *
 * Decoding validates at runtime; malformed entries are logged and skipped.
 */

import { readFile } from 'node:fs/promises';
import { appLogger } from '../platform';
import type { FamilyProfile } from '../../types';
import bundledProfiles from '../../data/familyProfiles.json';

export const UNKNOWN_FAMILY = 'unknown';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate and decode one profile entry.
 *
 * @returns Decoded profile or null if the entry is invalid
 */
export function decodeFamilyProfile(payload: unknown): FamilyProfile | null {
  if (!isRecord(payload)) {
    logInvalidProfile('Profile is not an object', payload);
    return null;
  }

  const { family, defaultTemperature, defaultTopP } = payload;
  if (typeof family !== 'string' || family.trim() === '') {
    logInvalidProfile('Profile missing family', payload);
    return null;
  }
  if (!isFiniteNumber(defaultTemperature) || !isFiniteNumber(defaultTopP)) {
    logInvalidProfile('Profile defaults must be numbers', payload);
    return null;
  }

  const list = (key: string): string[] => {
    const value = payload[key];
    if (value === undefined) return [];
    if (isStringArray(value)) return value;
    logInvalidProfile(`Profile field "${key}" is not a string list; ignoring it`, payload);
    return [];
  };

  return {
    family: family.trim().toLowerCase(),
    defaultTemperature,
    defaultTopP,
    preferred: list('preferred'),
    excellent: list('excellent'),
    problematic: list('problematic'),
    notes: list('notes'),
  };
}

function logInvalidProfile(reason: string, payload: unknown): void {
  appLogger.warn('introspection.family', 'Invalid family profile', { reason, payload });
}

/**
 * Read-only lookup of family profiles.
 */
export class FamilyProfileRegistry {
  private readonly profiles: ReadonlyMap<string, FamilyProfile>;
  private readonly families: readonly string[];

  /**
   * @param families - Family names in match order (first substring hit wins)
   * @param profiles - Profiles by family; families without one are valid
   */
  constructor(families: readonly string[], profiles: readonly FamilyProfile[]) {
    const ordered: string[] = [];
    for (const family of [...families.map((f) => f.toLowerCase()), ...profiles.map((p) => p.family)]) {
      if (!ordered.includes(family)) ordered.push(family);
    }
    this.families = ordered;
    this.profiles = new Map(profiles.map((p) => [p.family, p]));
  }

  /**
   * Build a registry from a JSON document of the shape
   * `{ families?: string[], profiles?: FamilyProfile[] }`.
   */
  static fromJson(document: unknown): FamilyProfileRegistry {
    if (!isRecord(document)) {
      appLogger.warn('introspection.family', 'Family profile document is not an object; using none');
      return new FamilyProfileRegistry([], []);
    }

    const families = isStringArray(document.families) ? document.families : [];
    const rawProfiles = Array.isArray(document.profiles) ? document.profiles : [];
    const profiles = rawProfiles
      .map(decodeFamilyProfile)
      .filter((p): p is FamilyProfile => p !== null);

    return new FamilyProfileRegistry(families, profiles);
  }

  /**
   * Load a registry from a JSON file on disk.
   * Read and parse errors propagate; invalid entries inside a readable file do not.
   */
  static async load(path: string): Promise<FamilyProfileRegistry> {
    const text = await readFile(path, 'utf8');
    const registry = FamilyProfileRegistry.fromJson(JSON.parse(text));
    appLogger.info('introspection.family', 'Loaded family profiles', {
      path,
      families: registry.listFamilies(),
    });
    return registry;
  }

  /**
   * Layer another registry on top of this one. Its profiles replace ours for
   * the same family; its new families are matched after ours.
   */
  extend(other: FamilyProfileRegistry): FamilyProfileRegistry {
    const merged = new Map(this.profiles);
    for (const profile of other.profiles.values()) {
      merged.set(profile.family, profile);
    }
    return new FamilyProfileRegistry([...this.families, ...other.families], [...merged.values()]);
  }

  /**
   * Family key by substring match, in declared order; "unknown" if none match.
   *
   * @example
   * registry.detectFamily('CodeLlama-13B-Instruct') // 'llama'
   */
  detectFamily(modelName: string): string {
    const name = modelName.toLowerCase();
    return this.families.find((family) => name.includes(family)) ?? UNKNOWN_FAMILY;
  }

  /**
   * Profile for a family. Absence is a normal outcome, never an error.
   */
  get(family: string): FamilyProfile | undefined {
    return this.profiles.get(family.toLowerCase());
  }

  listFamilies(): string[] {
    return [...this.families];
  }
}

let bundledRegistry: FamilyProfileRegistry | null = null;

/**
 * Registry built from the profiles shipped with the library.
 */
export function defaultFamilyRegistry(): FamilyProfileRegistry {
  if (!bundledRegistry) {
    bundledRegistry = FamilyProfileRegistry.fromJson(bundledProfiles);
  }
  return bundledRegistry;
}
