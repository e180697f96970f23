import { WishlistDocument, WishlistEntry } from './types';

export function formatEntry(entry: WishlistEntry): string {
    return `dimwishlist:item=${entry.item}&perks=${entry.perks.join(',')}`;
}

/**
 * Renders a document in DIM's wishlist syntax. A `//notes:` line applies to
 * the roll lines below it until the next blank line, so every block ends
 * with one.
 */
export function formatWishlist(document: WishlistDocument): string {
    const lines: string[] = [
        `title:${document.title}`,
        `description:${document.description}`,
        '',
    ];

    for (const block of document.blocks) {
        if (block.comment !== undefined) {
            lines.push(`//notes:${block.comment}`);
        }
        for (const entry of block.entries) {
            lines.push(formatEntry(entry));
        }
        lines.push('');
    }

    // The trailing blank entry already provides the final newline
    return lines.join('\n');
}
