export class SheetFetchError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SheetFetchError';
    }
}

export class SourceFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SourceFormatError';
    }
}

export class BungieApiError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BungieApiError';
    }
}
