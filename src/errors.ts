/**
 * Raised when the article table does not match the expected schema.
 * Not recoverable from the UI: the data file has to be fixed.
 */
export class DataFormatError extends Error {
    readonly column?: string;
    readonly row?: number;

    constructor(message: string, details: { column?: string; row?: number } = {}) {
        super(message);
        this.name = 'DataFormatError';
        this.column = details.column;
        this.row = details.row;
    }
}
