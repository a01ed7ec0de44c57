/**
 * Retry tests.
 *
 * Delays are zero so every attempt runs on the next tick.
 */
import { describe, it, expect } from 'vitest'

import { retry } from '../../../src/core/shared/retry.js'
import { rejectionOf } from '../../support/versions.js'


function flaky(failures: number, message = 'connect ECONNREFUSED') {

    let calls = 0

    const fn = async (): Promise<string> => {

        calls++

        if (calls <= failures) throw new Error(`${message} (${calls})`)

        return 'connected'
    }

    return { fn, calls: () => calls }
}


describe('shared: retry', () => {

    it('should resolve once an attempt succeeds', async () => {

        const { fn, calls } = flaky(2)

        expect(await retry(fn, { retries: 3, delay: 0, backoff: 2 })).toBe('connected')
        expect(calls()).toBe(3)
    })

    it('should throw the last failure when retries run out', async () => {

        const { fn, calls } = flaky(10)

        const err = await rejectionOf(retry(fn, { retries: 2, delay: 0, backoff: 2 }))

        expect(err).toMatchObject({ message: 'connect ECONNREFUSED (3)' })
        expect(calls()).toBe(3)
    })

    it('should stop at once when shouldRetry refuses', async () => {

        const { fn, calls } = flaky(10, 'password authentication failed')

        const err = await rejectionOf(retry(fn, {
            retries: 3,
            delay: 0,
            backoff: 2,
            shouldRetry: (e) => !e.message.includes('authentication'),
        }))

        expect(err).toMatchObject({ message: 'password authentication failed (1)' })
        expect(calls()).toBe(1)
    })
})
