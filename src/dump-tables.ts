#!/usr/bin/env node
/*
 * Dump lookup tables of every weapon and every random-roll perk to CSV for
 * importing into the roll sheet, which maps the names typed there onto hashes.
 */
import * as core from '@actions/core';
import {
    DefinitionTable,
    fetchContent,
    fetchManifest,
    InventoryItemDefinition,
    ItemCategoryDefinition,
    PlugSetDefinition,
} from './bungie';
import { allRandomRollPerks, toLookupCsv, weaponNamesAndHashes } from './tables';
import { writeOutputFile } from './writer';
import { PERK_NAMES_PATH, WEAPON_NAMES_PATH } from './config';

export interface DumpOptions {
    apiKey?: string;
    weaponsPath?: string;
    perksPath?: string;
}

export async function dumpTables(options: DumpOptions = {}): Promise<void> {
    const apiKey = options.apiKey ?? process.env.BUNGIE_API_KEY;
    const weaponsPath = options.weaponsPath ?? WEAPON_NAMES_PATH;
    const perksPath = options.perksPath ?? PERK_NAMES_PATH;

    if (!apiKey) {
        core.setFailed("Can't find Bungie API key. Set BUNGIE_API_KEY.");
        return;
    }

    try {
        // The manifest only indexes the content blobs, so fetch just the three we need
        let items: DefinitionTable<InventoryItemDefinition>;
        let categories: DefinitionTable<ItemCategoryDefinition>;
        let plugSets: DefinitionTable<PlugSetDefinition>;

        core.startGroup('Fetching manifest content');
        try {
            const manifest = await fetchManifest(apiKey);
            items = await fetchContent<InventoryItemDefinition>(manifest, 'DestinyInventoryItemDefinition', apiKey);
            categories = await fetchContent<ItemCategoryDefinition>(manifest, 'DestinyItemCategoryDefinition', apiKey);
            plugSets = await fetchContent<PlugSetDefinition>(manifest, 'DestinyPlugSetDefinition', apiKey);
        } finally {
            core.endGroup();
        }

        const weapons = weaponNamesAndHashes(categories, items);
        core.info(`Writing ${weapons.size} weapons to ${weaponsPath}`);
        await writeOutputFile(weaponsPath, toLookupCsv(weapons));

        const perks = allRandomRollPerks(categories, items, plugSets);
        core.info(`Writing ${perks.size} perks to ${perksPath}`);
        await writeOutputFile(perksPath, toLookupCsv(perks));
    } catch (error) {
        core.setFailed(error instanceof Error ? error.message : String(error));
    }
}

if (require.main === module) {
    void dumpTables();
}
