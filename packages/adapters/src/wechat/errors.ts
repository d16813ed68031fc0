/** The request never produced a provider answer (network failure, non-2xx status, unreadable body). */
export class ProviderTransportError extends Error {
    readonly code = 'PROVIDER_TRANSPORT_ERROR';

    constructor(
        readonly operation: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(`Provider ${operation} transport failure: ${message}`, options);
        this.name = 'ProviderTransportError';
    }
}
