/**
 * Raised when a compatibility result does not name exactly one or two packages
 */
export class InvalidPackageSetError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidPackageSetError';
    }
}
