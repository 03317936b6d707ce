export class CheckerUnavailableError extends Error {
    readonly packageName: string;

    constructor(packageName: string, description: string) {
        super(`Checker server gave no answer for ${packageName}: ${description}`);
        this.name = 'CheckerUnavailableError';
        this.packageName = packageName;
    }
}
