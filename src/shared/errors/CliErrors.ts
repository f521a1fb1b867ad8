export class InvalidPriceInputError extends Error {
    constructor(
        public readonly token: string,
        public readonly position: number
    ) {
        super(`Invalid price "${token}" at position ${position}: expected a safe integer`);
        this.name = 'InvalidPriceInputError';
    }
}

export class UnknownCommandError extends Error {
    constructor(public readonly command: string) {
        super(`Unknown command "${command}". Use "demo" or "calc <p1,p2,...>"`);
        this.name = 'UnknownCommandError';
    }
}

export class UnexpectedArgumentError extends Error {
    constructor(
        public readonly command: string,
        public readonly argument: string
    ) {
        super(`Unexpected argument "${argument}" for command "${command}"`);
        this.name = 'UnexpectedArgumentError';
    }
}
