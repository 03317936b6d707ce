export class ConfigurationError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(message);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}
