/**
 * src/locations/types.ts
 *
 * Entities of the four-level administrative hierarchy
 * (district → taluka → hobli → village) and the search target derived
 * from it.
 */

export type LocationLevel = 'district' | 'taluka' | 'hobli' | 'village';

export const LOCATION_LEVELS: readonly LocationLevel[] = ['district', 'taluka', 'hobli', 'village'];

interface NamedLocation {
    code: number;
    name: string;
    /** Name in the regional script, empty when the portal has none. */
    localizedName: string;
}

export interface District extends NamedLocation {}

export interface Taluka extends NamedLocation {
    districtCode: number;
}

export interface Hobli extends NamedLocation {
    talukaCode: number;
}

/** Unique by (code, hobliCode): the same village code can recur under other hoblis. */
export interface Village extends NamedLocation {
    hobliCode: number;
    isUrban: boolean;
}

/** A fully resolved leaf. Never persisted. */
export interface SearchTarget {
    districtCode: number;
    talukaCode: number;
    hobliCode: number;
    villageCode: number;
    districtName: string;
    talukaName: string;
    hobliName: string;
    villageName: string;
}

export type LevelCounts = Record<LocationLevel, number>;

export interface VillageHierarchy {
    district: District;
    taluka: Taluka;
    hobli: Hobli;
    village: Village;
}

export function targetKey(t: Pick<SearchTarget, 'districtCode' | 'talukaCode' | 'hobliCode' | 'villageCode'>): string {
    return `${t.districtCode}/${t.talukaCode}/${t.hobliCode}/${t.villageCode}`;
}

export function describeTarget(t: SearchTarget): string {
    return `${t.villageName} (${t.villageCode}), ${t.hobliName} / ${t.talukaName} / ${t.districtName}`;
}
