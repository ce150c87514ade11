/**
 * Options for a single admission decision.
 */
export interface AllowRequestOptions {
    /** Aborts waiting on the counter store; the decision then fails open */
    signal?: AbortSignal;
}

/**
 * Admission decision for one caller on one endpoint.
 */
export interface IRateLimiter {
    /**
     * Resolves to true when the request may proceed.
     * Never rejects: store failures resolve to an admission.
     *
     * @param endpoint - Normalized endpoint (e.g. "/ping"), not the raw path
     * @param userId - Caller identity (e.g. forwarded client address)
     */
    allowRequest(endpoint: string, userId: string, options?: AllowRequestOptions): Promise<boolean>;
}
