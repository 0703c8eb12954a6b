import fs from 'node:fs';
import { z } from 'zod';
import { BUILDING_TYPES, MACHINE_TYPES, type BuildingType, type MachineType } from './types.js';

const buildingTypeEntrySchema = z.object({
  label: z.string().min(1),
  osmTags: z.array(z.string().regex(/^[a-z_:]+=[a-z_]+$/)).min(1),
  googleTypes: z.array(z.string().min(1)),
  nameIncludes: z.array(z.string().min(1)).optional()
});

const machineTypeEntrySchema = z.object({
  label: z.string().min(1),
  buildingTypes: z.array(z.enum(BUILDING_TYPES)).min(1)
});

const catalogFileSchema = z.object({
  buildingTypes: z.record(z.string(), buildingTypeEntrySchema),
  machineTypes: z.record(z.string(), machineTypeEntrySchema)
});

export type BuildingTypeEntry = z.infer<typeof buildingTypeEntrySchema>;
export type MachineTypeEntry = z.infer<typeof machineTypeEntrySchema>;

export interface Catalog {
  buildingTypes: ReadonlyMap<BuildingType, BuildingTypeEntry>;
  machineTypes: ReadonlyMap<MachineType, MachineTypeEntry>;
}

function pickEntries<K extends string, V>(ids: readonly K[], raw: Record<string, V>, kind: string): Map<K, V> {
  const unknown = Object.keys(raw).filter((key) => !(ids as readonly string[]).includes(key));
  if (unknown.length > 0) {
    throw new Error(`Catalog has unknown ${kind}: ${unknown.join(', ')}`);
  }

  const out = new Map<K, V>();
  for (const id of ids) {
    const entry = raw[id];
    if (!entry) throw new Error(`Catalog is missing ${kind} "${id}"`);
    out.set(id, entry);
  }
  return out;
}

export function parseCatalog(input: unknown): Catalog {
  const parsed = catalogFileSchema.parse(input);
  return {
    buildingTypes: pickEntries(BUILDING_TYPES, parsed.buildingTypes, 'building type'),
    machineTypes: pickEntries(MACHINE_TYPES, parsed.machineTypes, 'machine type')
  };
}

let catalog: Catalog | undefined;

export function getCatalog(): Catalog {
  if (catalog) return catalog;
  const raw: unknown = JSON.parse(
    fs.readFileSync(new URL('./data/catalog.json', import.meta.url), { encoding: 'utf8' })
  );
  catalog = parseCatalog(raw);
  return catalog;
}

function buildingEntry(type: BuildingType): BuildingTypeEntry {
  const entry = getCatalog().buildingTypes.get(type);
  if (!entry) throw new Error(`Unknown building type ${type}`);
  return entry;
}

export function isBuildingType(value: string): value is BuildingType {
  return (BUILDING_TYPES as readonly string[]).includes(value);
}

function isMachineType(value: string): value is MachineType {
  return (MACHINE_TYPES as readonly string[]).includes(value);
}

/**
 * Accepts catalog ids (`snack_machine`) as well as their short form (`snack`,
 * `hot-food`), case-insensitively.
 */
export function parseMachineType(value: string): MachineType | undefined {
  const key = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  if (isMachineType(key)) return key;
  return MACHINE_TYPES.find((id) => id.replace(/_(machine|kiosk)$/, '') === key);
}

export function buildingTypesForMachine(machineType: MachineType): BuildingType[] {
  const entry = getCatalog().machineTypes.get(machineType);
  return entry ? [...entry.buildingTypes] : [];
}

/**
 * Building types to ask the providers for. A filter narrows the machine type's
 * venues; a filter with no overlap falls back to every venue of the machine type.
 */
export function queryBuildingTypes(machineType: MachineType, filter: readonly BuildingType[]): BuildingType[] {
  const venues = buildingTypesForMachine(machineType);
  if (filter.length === 0) return venues;
  const narrowed = venues.filter((type) => filter.includes(type));
  return narrowed.length > 0 ? narrowed : venues;
}

export function osmTagsFor(types: readonly BuildingType[]): string[] {
  const tags = new Set<string>();
  for (const type of types) {
    for (const tag of buildingEntry(type).osmTags) tags.add(tag);
  }
  return [...tags];
}

export function googleTypesFor(type: BuildingType): string[] {
  return [...buildingEntry(type).googleTypes];
}

function nameAllowed(entry: BuildingTypeEntry, name: string): boolean {
  if (!entry.nameIncludes) return true;
  const lowered = name.toLowerCase();
  return entry.nameIncludes.some((needle) => lowered.includes(needle));
}

/** Building types an OSM element belongs to, in catalog order. */
export function classifyOsmTags(tags: Readonly<Record<string, string>>, name: string): BuildingType[] {
  const out: BuildingType[] = [];
  for (const [type, entry] of getCatalog().buildingTypes) {
    const tagged = entry.osmTags.some((tag) => {
      const [key, value] = tag.split('=');
      return key !== undefined && tags[key] === value;
    });
    if (tagged && nameAllowed(entry, name)) out.push(type);
  }
  return out;
}

/** Building types a Google place belongs to, in catalog order. */
export function classifyGoogleTypes(types: readonly string[], name: string): BuildingType[] {
  const out: BuildingType[] = [];
  for (const [type, entry] of getCatalog().buildingTypes) {
    if (entry.googleTypes.some((t) => types.includes(t)) && nameAllowed(entry, name)) out.push(type);
  }
  return out;
}
