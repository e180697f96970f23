// Published CSV export of the roll recommendation sheet
export const SHEET_ID = '1rWZsmQ0pVYbLz2ZtVfsTfT2SbgPEjRBhjqV2bNWhN0c';
export const SHEET_GID = '0';
export const SHEET_CSV_URL = `https://docs.google.com/spreadsheets/d/${SHEET_ID}/export?format=csv&gid=${SHEET_GID}`;

export const OUTPUT_PATH = 'wishlist.txt';

export const WISHLIST_TITLE = 'Destiny 2 Roll Recommendations';
export const WISHLIST_DESCRIPTION = 'Generated from the community roll recommendation spreadsheet.';

export const BUNGIE_ROOT = 'https://www.bungie.net';
export const MANIFEST_URL = `${BUNGIE_ROOT}/platform/Destiny2/Manifest/`;
export const WEAPON_NAMES_PATH = 'weapon_names.csv';
export const PERK_NAMES_PATH = 'perk_names.csv';
