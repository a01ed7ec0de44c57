/**
 * Versioner context.
 *
 * Wraps a wired `Versioner` with the resources it was built from, so they
 * are released together.
 */
import { attempt } from '../core/shared/attempt.js';
import { SyncError } from '../core/versioner/errors.js';
import type { Versioner } from '../core/versioner/versioner.js';
import type { SyncPlan, VersionStatus } from '../core/versioner/types.js';
import type { TransactionalChangesListener } from '../core/listeners/transactional.js';
import type { Logger } from '../core/logger/logger.js';

/**
 * Resources owned by a context.
 */
export interface ContextResources {
    versioner: Versioner;
    logger: Logger;
    transactional: TransactionalChangesListener | null;

    /** Stop an SDK-built logger */
    stopLogger: (() => Promise<void>) | null;

    /** Destroy an SDK-opened connection */
    destroy: (() => Promise<void>) | null;
}

export class VersionerContext {

    readonly #versioner: Versioner;
    readonly #logger: Logger;
    readonly #transactional: TransactionalChangesListener | null;
    #stopLogger: (() => Promise<void>) | null;
    #destroy: (() => Promise<void>) | null;

    constructor(resources: ContextResources) {

        this.#versioner = resources.versioner;
        this.#logger = resources.logger;
        this.#transactional = resources.transactional;
        this.#stopLogger = resources.stopLogger;
        this.#destroy = resources.destroy;

    }

    // ─────────────────────────────────────────────────────────
    // Properties
    // ─────────────────────────────────────────────────────────

    get versioner(): Versioner {

        return this.#versioner;

    }

    get logger(): Logger {

        return this.#logger;

    }

    // ─────────────────────────────────────────────────────────
    // Operations
    // ─────────────────────────────────────────────────────────

    /**
     * Bring the structure to `target`, then roll back any transaction the
     * sync left open.
     *
     * When both fail, the sync error is thrown with the release failure on
     * its `releaseError`.
     */
    async sync(target: number): Promise<void> {

        const [, syncErr] = await attempt(() => this.#versioner.sync(target));
        const [, releaseErr] = await attempt(async () => {

            await this.#transactional?.release();

        });

        if (releaseErr) {

            this.#logger.error('could not release transaction', { target, error: releaseErr });

        }

        if (syncErr) {

            if (releaseErr && syncErr instanceof SyncError) {

                syncErr.releaseError = releaseErr;

            }

            throw syncErr;

        }

        if (releaseErr) {

            throw releaseErr;

        }

    }

    /**
     * Sync to the highest version held.
     */
    async upgradeToLast(): Promise<void> {

        await this.sync(this.#versioner.lastVersion());

    }

    /**
     * Compare the recorded version with the highest version held.
     */
    async status(): Promise<VersionStatus> {

        return this.#versioner.status();

    }

    /**
     * Versions a sync to `target` would apply.
     */
    async plan(target: number): Promise<SyncPlan> {

        return this.#versioner.plan(target);

    }

    /**
     * Stop the SDK-built logger and destroy the SDK-opened connection.
     *
     * Resources passed in by the caller are left alone. Safe to call twice.
     */
    async close(): Promise<void> {

        const stopLogger = this.#stopLogger;
        const destroy = this.#destroy;

        this.#stopLogger = null;
        this.#destroy = null;

        await stopLogger?.();
        await destroy?.();

    }

}
