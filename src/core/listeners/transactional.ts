/**
 * Transactional changes listener.
 *
 * Opens a transaction on `before-change`, commits it on `after-change` and
 * rolls it back on `error-during-change`, so every version is applied all or
 * nothing. Versions and the applier see the open transaction through `db`:
 * give them `() => listener.db` and a change commits together with its
 * version marker.
 *
 * At most one transaction is held. The engine never nests changes, so a
 * second `before-change` while one is open means the events are being driven
 * out of order.
 *
 * @example
 * ```typescript
 * const transactional = new TransactionalChangesListener(db)
 * const applier = new KyselyVersionApplier(() => transactional.db.withTables<VersionerDatabase>())
 *
 * const versioner = new Versioner(applier, versions, transactional)
 *
 * try {
 *     await versioner.upgradeToLast()
 * }
 * finally {
 *     await transactional.release()
 * }
 * ```
 */
import type { ControlledTransaction, Kysely } from 'kysely';

import type { Listener, VersionerEvent } from '../versioner/types.js';

/**
 * Transaction operation that was attempted out of order.
 */
export type TransactionOperation = 'begin' | 'commit' | 'rollback';

/**
 * Error when transaction events arrive out of order.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => listener.on({ type: 'after-change', version, direction }))
 * if (err instanceof TransactionScopeError) {
 *     console.log(`cannot ${err.operation}: ${err.message}`)
 * }
 * ```
 */
export class TransactionScopeError extends Error {

    override readonly name = 'TransactionScopeError' as const;

    constructor(
        public readonly operation: TransactionOperation,
        reason: string,
    ) {

        super(`cannot ${operation} transaction: ${reason}`);

    }

}

export class TransactionalChangesListener<DB = unknown> implements Listener {

    readonly #db: Kysely<DB>;
    #transaction: ControlledTransaction<DB> | null = null;
    #version: number | null = null;

    constructor(db: Kysely<DB>) {

        this.#db = db;

    }

    /**
     * The open transaction, or the base connection when none is open.
     */
    get db(): Kysely<DB> {

        return this.#transaction ?? this.#db;

    }

    /**
     * Whether a change transaction is currently open.
     */
    get inTransaction(): boolean {

        return this.#transaction !== null;

    }

    async on(event: VersionerEvent): Promise<void> {

        switch (event.type) {

            case 'before-change':
                await this.#begin(event.version.number);
                break;

            case 'after-change':
                await this.#take('commit').commit().execute();
                break;

            case 'error-during-change':
                await this.#take('rollback').rollback().execute();
                break;

        }

    }

    /**
     * Roll back a transaction left open by an aborted sync.
     *
     * A listener that vetoes `before-change` after this one opened its
     * transaction stops the sync before any closing event. Call this once
     * the sync settles.
     */
    async release(): Promise<void> {

        if (this.#transaction === null) {

            return;

        }

        await this.#take('rollback').rollback().execute();

    }

    async #begin(version: number): Promise<void> {

        if (this.#transaction !== null) {

            throw new TransactionScopeError(
                'begin',
                `a transaction is already open for version ${this.#version}`,
            );

        }

        this.#transaction = await this.#db.startTransaction().execute();
        this.#version = version;

    }

    /**
     * Detach the open transaction so it is cleared whether or not closing it succeeds.
     */
    #take(operation: TransactionOperation): ControlledTransaction<DB> {

        const transaction = this.#transaction;

        if (transaction === null) {

            throw new TransactionScopeError(operation, 'no transaction is open');

        }

        this.#transaction = null;
        this.#version = null;

        return transaction;

    }

}
