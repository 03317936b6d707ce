export class PackageNotSupportedError extends Error {
    readonly packageName: string;

    constructor(packageName: string) {
        super(`Package ${packageName} is not supported by the checker server.`);
        this.name = 'PackageNotSupportedError';
        this.packageName = packageName;
    }
}
