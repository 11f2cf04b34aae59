/**
 * Error raised for any malformed, inconsistent or unresolvable directive.
 */
export class DirectiveError extends Error {
    /** 1-based script line, when the failure is tied to one */
    public readonly line?: number;
    /** Directive text as written, when known */
    public readonly directive?: string;

    constructor(message: string, options: { line?: number; directive?: string } = {}) {
        super(message);
        this.name = 'DirectiveError';
        this.line = options.line;
        this.directive = options.directive;
    }

    /**
     * Copy of this error pinned to a script line. Keeps an existing line number.
     */
    atLine(line: number, directive?: string): DirectiveError {
        return new DirectiveError(this.message, {
            line: this.line ?? line,
            directive: this.directive ?? directive,
        });
    }

    /**
     * Message prefixed with its location, for console output.
     */
    toLocatedMessage(): string {
        return this.line === undefined ? this.message : `line ${this.line}: ${this.message}`;
    }
}
