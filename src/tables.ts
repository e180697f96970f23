import { stringify } from 'csv-stringify/sync';
import {
    DefinitionTable,
    InventoryItemDefinition,
    ItemCategoryDefinition,
    PlugSetDefinition,
} from './bungie';

export type LookupTable = Map<number, string>;

export function weaponCategoryHash(categories: DefinitionTable<ItemCategoryDefinition>): number {
    const weapon = Object.values(categories).find(c => c.displayProperties?.name === 'Weapon');
    if (!weapon) {
        throw new Error("No item category named 'Weapon' in category definitions");
    }
    return weapon.hash;
}

/** Weapon item hash to display name. */
export function weaponNamesAndHashes(
    categories: DefinitionTable<ItemCategoryDefinition>,
    items: DefinitionTable<InventoryItemDefinition>
): LookupTable {
    const weaponHash = weaponCategoryHash(categories);
    const table: LookupTable = new Map();

    for (const item of Object.values(items)) {
        if (item.itemCategoryHashes?.includes(weaponHash)) {
            table.set(item.hash, item.displayProperties.name);
        }
    }

    return table;
}

/**
 * Every perk that can appear in a randomized socket of the item. Sockets
 * without a `randomizedPlugSetHash` (intrinsics, fixed perks, mod slots) are
 * ignored.
 */
export function randomRollPerkIds(
    itemHash: number,
    items: DefinitionTable<InventoryItemDefinition>,
    plugSets: DefinitionTable<PlugSetDefinition>
): Set<number> {
    const perkIds = new Set<number>();
    const socketEntries = items[String(itemHash)]?.sockets?.socketEntries ?? [];

    for (const entry of socketEntries) {
        if (entry.randomizedPlugSetHash === undefined) continue;

        const plugSet = plugSets[String(entry.randomizedPlugSetHash)];
        for (const plug of plugSet?.reusablePlugItems ?? []) {
            perkIds.add(plug.plugItemHash);
        }
    }

    return perkIds;
}

export function allRandomRollPerks(
    categories: DefinitionTable<ItemCategoryDefinition>,
    items: DefinitionTable<InventoryItemDefinition>,
    plugSets: DefinitionTable<PlugSetDefinition>
): LookupTable {
    const weaponHash = weaponCategoryHash(categories);
    const perkIds = new Set<number>();

    for (const item of Object.values(items)) {
        if (!item.itemCategoryHashes?.includes(weaponHash)) continue;
        randomRollPerkIds(item.hash, items, plugSets).forEach(id => perkIds.add(id));
    }

    const table: LookupTable = new Map();
    for (const id of perkIds) {
        const perk = items[String(id)];
        if (perk) {
            table.set(id, perk.displayProperties.name);
        }
    }

    return table;
}

export function toLookupCsv(table: LookupTable): string {
    const rows = [...table.entries()]
        .sort(([hashA, nameA], [hashB, nameB]) => {
            if (nameA !== nameB) return nameA < nameB ? -1 : 1;
            return hashA - hashB;
        })
        .map(([hash, name]) => ({ name, hash }));

    return stringify(rows, { header: true, columns: ['name', 'hash'] });
}
