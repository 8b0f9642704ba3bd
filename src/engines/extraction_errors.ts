export class ReportNotFoundError extends Error {
    readonly filePath: string;

    constructor(filePath: string) {
        super(`File not found: ${filePath}`);
        this.name = 'ReportNotFoundError';
        this.filePath = filePath;
    }
}

export class UnsupportedFormatError extends Error {
    readonly extension: string;

    constructor(extension: string) {
        super(`Unsupported format: ${extension || '(none)'}`);
        this.name = 'UnsupportedFormatError';
        this.extension = extension;
    }
}
