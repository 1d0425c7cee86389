/**
 * Structural errors that abort a reconciliation run.
 *
 * Row-level remote rejections never surface as exceptions; only the classes
 * below propagate to the CLI, which reports them and exits non-zero.
 */

export class ReconciliationError extends Error {
    constructor(message: string, readonly lineNumber: number | null = null) {
        super(lineNumber === null ? message : `Line ${lineNumber}: ${message}`);
        this.name = 'ReconciliationError';
    }
}

export class ClassificationError extends ReconciliationError {
    constructor(readonly transactionType: string, lineNumber: number) {
        super(`Unable to map transaction type "${transactionType}" to an operation`, lineNumber);
        this.name = 'ClassificationError';
    }
}

export class MergePairingError extends ReconciliationError {
    constructor(message: string, lineNumber: number) {
        super(message, lineNumber);
        this.name = 'MergePairingError';
    }
}

export class OptionsConflictError extends ReconciliationError {
    constructor(message: string) {
        super(message);
        this.name = 'OptionsConflictError';
    }
}

export class UnresolvedHoldingError extends ReconciliationError {
    constructor(symbol: string, market: string, lineNumber: number) {
        super(`No holding found for ${symbol} on ${market}`, lineNumber);
        this.name = 'UnresolvedHoldingError';
    }
}

export class UnresolvedCashAccountError extends ReconciliationError {
    constructor(currency: string, accountName: string, lineNumber: number) {
        super(`No ${currency} cash account "${accountName || 'default'}" in this portfolio`, lineNumber);
        this.name = 'UnresolvedCashAccountError';
    }
}
