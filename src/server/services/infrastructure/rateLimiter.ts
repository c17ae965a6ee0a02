/**
 * Rate Limiter Service
 *
 * Token bucket bounding outbound text-generation requests across every
 * concurrent caller in the process. Waiters are served in arrival order;
 * all bucket mutation happens on the synchronous refill/drain path.
 */

import { CancellationError, ConfigurationError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';

export interface RateLimiter {
    /**
     * Resolve once a request token has been granted to the caller
     * @throws {CancellationError} when `signal` aborts before the grant
     */
    acquire(signal?: AbortSignal): Promise<void>;
}

export interface RateLimitConfig {
    requestsPerMinute: number;
    burstSize?: number; // Bucket capacity, default 1
}

interface QueuedRequest {
    resolve: () => void;
    reject: (error: Error) => void;
    timestamp: number;
    signal?: AbortSignal;
    onAbort?: () => void;
}

// Absorbs floating point drift when a refill lands exactly on a whole token
const TOKEN_EPSILON = 1e-9;

export class TokenBucketRateLimiter implements RateLimiter {
    private readonly capacity: number;
    private readonly tokensPerMs: number;
    private tokens: number;
    private lastRefill: number;
    private readonly queue: QueuedRequest[] = [];
    private timer: NodeJS.Timeout | null = null;

    constructor(config: RateLimitConfig, private readonly now: () => number = Date.now) {
        const burstSize = config.burstSize ?? 1;

        if (!Number.isFinite(config.requestsPerMinute) || config.requestsPerMinute <= 0) {
            throw new ConfigurationError(
                'RateLimiter',
                ['RATE_LIMIT_RPM'],
                `requestsPerMinute must be greater than 0, got ${config.requestsPerMinute}`
            );
        }
        if (!Number.isInteger(burstSize) || burstSize < 1) {
            throw new ConfigurationError(
                'RateLimiter',
                ['RATE_LIMIT_BURST'],
                `burstSize must be a positive integer, got ${burstSize}`
            );
        }

        this.capacity = burstSize;
        this.tokensPerMs = config.requestsPerMinute / 60_000;
        this.tokens = burstSize;
        this.lastRefill = this.now();
    }

    /**
     * Number of callers waiting for a token
     */
    get pendingCount(): number {
        return this.queue.length;
    }

    acquire(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            return Promise.reject(new CancellationError('Rate limit acquisition cancelled'));
        }

        this.refill();
        if (this.queue.length === 0 && this.hasToken()) {
            this.takeToken();
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            const request: QueuedRequest = {
                resolve,
                reject,
                timestamp: this.now(),
                signal,
            };

            if (signal) {
                request.onAbort = () => {
                    this.removeFromQueue(request);
                    reject(new CancellationError('Rate limit acquisition cancelled', {
                        waitedMs: this.now() - request.timestamp,
                    }));
                };
                signal.addEventListener('abort', request.onAbort, { once: true });
            }

            this.queue.push(request);
            createChildLogger({ component: 'TokenBucketRateLimiter' })
                .debug({ pending: this.queue.length }, 'Waiting for rate limit token');
            this.scheduleDrain();
        });
    }

    /**
     * Stop the refill timer and reject every waiter (process shutdown)
     */
    dispose(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }

        const waiting = this.queue.splice(0, this.queue.length);
        for (const request of waiting) {
            this.detachSignal(request);
            request.reject(new CancellationError('Rate limiter disposed'));
        }

        if (waiting.length > 0) {
            createChildLogger({ component: 'TokenBucketRateLimiter' })
                .info({ rejected: waiting.length }, 'Rate limiter disposed with pending requests');
        }
    }

    private hasToken(): boolean {
        return this.tokens >= 1 - TOKEN_EPSILON;
    }

    private takeToken(): void {
        this.tokens = Math.max(0, this.tokens - 1);
    }

    private refill(): void {
        const now = this.now();
        const elapsed = now - this.lastRefill;
        if (elapsed > 0) {
            this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.tokensPerMs);
            this.lastRefill = now;
        }
    }

    private drain(): void {
        this.timer = null;
        this.refill();

        while (this.queue.length > 0 && this.hasToken()) {
            const request = this.queue.shift();
            if (!request) {
                break;
            }
            this.takeToken();
            this.detachSignal(request);
            request.resolve();
        }

        this.scheduleDrain();
    }

    private scheduleDrain(): void {
        if (this.timer || this.queue.length === 0) {
            return;
        }

        const waitMs = Math.max(0, Math.ceil((1 - this.tokens) / this.tokensPerMs));
        this.timer = setTimeout(() => this.drain(), waitMs);
    }

    private removeFromQueue(request: QueuedRequest): void {
        const index = this.queue.indexOf(request);
        if (index >= 0) {
            this.queue.splice(index, 1);
        }

        if (this.queue.length === 0 && this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    private detachSignal(request: QueuedRequest): void {
        if (request.signal && request.onAbort) {
            request.signal.removeEventListener('abort', request.onAbort);
        }
    }
}
