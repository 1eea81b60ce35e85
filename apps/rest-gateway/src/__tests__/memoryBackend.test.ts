import {createHash} from 'node:crypto'

import type {SignedKey} from '@keyserver-rest/schemas'
import {beforeEach, describe, expect, it} from 'vitest'

import type {RequestContext} from '../backend'
import {armorPublicKey, InMemoryKeyServerBackend} from '../memoryBackend'

const context: RequestContext = {correlationId: 'corr-mem', requestId: 'req-mem', method: 'GET', route: '/test'}

const signedKey = (appId: string, keyData = 'dGVzdC1rZXk='): SignedKey => ({
  key: {app_id: appId, format: 'openpgp', key_data: keyData},
  signature: 'c2ln'
})

const sha256Hex = (value: string) => createHash('sha256').update(value, 'utf8').digest('hex')

describe('InMemoryKeyServerBackend', () => {
  let backend: InMemoryKeyServerBackend

  beforeEach(() => {
    backend = new InMemoryKeyServerBackend({now: () => new Date('2026-01-02T03:04:05.678Z')})
  })

  const update = (userId: string, appId = 'pgp', keyData?: string) =>
    backend.updateEntry(context, {user_id: userId, signed_key: signedKey(appId, keyData)})

  it('advances epoch and commitment timestamp on every update', async () => {
    expect(await update('alice@example.com')).toEqual({user_id: 'alice@example.com', epoch: 1, commitment_timestamp: 1})
    expect(await update('bob@example.com')).toEqual({user_id: 'bob@example.com', epoch: 2, commitment_timestamp: 2})
  })

  it('requires a user id and a signed key', async () => {
    await expect(backend.updateEntry(context, {user_id: '', signed_key: signedKey('pgp')})).rejects.toMatchObject({
      code: 'invalid_argument',
      message: 'user_id is required'
    })
    await expect(backend.updateEntry(context, {user_id: 'alice@example.com'})).rejects.toMatchObject({
      code: 'invalid_argument',
      message: 'signed_key is required'
    })
  })

  it('returns the newest entry filtered by app id and epoch', async () => {
    await update('alice@example.com', 'gmail')
    await update('bob@example.com', 'pgp')
    await update('alice@example.com', 'pgp')

    expect(await backend.getEntry(context, {user_id: 'alice@example.com', epoch: 0n, app_id: ''})).toMatchObject({
      epoch: 3,
      app_id: 'pgp'
    })
    expect(await backend.getEntry(context, {user_id: 'alice@example.com', epoch: 2n, app_id: ''})).toMatchObject({
      epoch: 1,
      app_id: 'gmail'
    })
    expect(
      await backend.getEntry(context, {user_id: 'alice@example.com', epoch: 0n, app_id: 'gmail'})
    ).toMatchObject({epoch: 1})
    await expect(
      backend.getEntry(context, {user_id: 'carol@example.com', epoch: 0n, app_id: ''})
    ).rejects.toMatchObject({code: 'not_found', message: 'No entry for user carol@example.com'})
  })

  it('returns copies that callers cannot mutate', async () => {
    await update('alice@example.com')

    const first = await backend.getEntry(context, {user_id: 'alice@example.com', epoch: 0n, app_id: ''})
    first.signed_key.key.app_id = 'changed'

    const second = await backend.getEntry(context, {user_id: 'alice@example.com', epoch: 0n, app_id: ''})
    expect(second.signed_key.key.app_id).toBe('pgp')
  })

  it('pages through entry history', async () => {
    await update('alice@example.com')
    await update('bob@example.com')
    await update('alice@example.com')

    const firstPage = await backend.listEntryHistory(context, {
      user_id: 'alice@example.com',
      start_epoch: 0n,
      page_size: 1
    })
    expect(firstPage.values.map(entry => entry.epoch)).toEqual([1])
    expect(firstPage.next_epoch).toBe(3)

    const secondPage = await backend.listEntryHistory(context, {
      user_id: 'alice@example.com',
      start_epoch: BigInt(firstPage.next_epoch),
      page_size: 1
    })
    expect(secondPage.values.map(entry => entry.epoch)).toEqual([3])
    expect(secondPage.next_epoch).toBe(0)
  })

  it('applies the default and maximum page sizes', async () => {
    for (let index = 0; index < 105; index += 1) {
      await update(`user${String(index)}@example.com`)
    }

    const defaultPage = await backend.listUpdate(context, {start_commitment_timestamp: 0n, page_size: 0})
    expect(defaultPage.updates).toHaveLength(10)
    expect(defaultPage.next_commitment_timestamp).toBe(11)

    const clampedPage = await backend.listUpdate(context, {start_commitment_timestamp: 0n, page_size: 1000})
    expect(clampedPage.updates).toHaveLength(100)
    expect(clampedPage.next_commitment_timestamp).toBe(101)

    const lastPage = await backend.listSteps(context, {start_commitment_timestamp: 101n, page_size: 0})
    expect(lastPage.steps.map(step => step.commitment_timestamp)).toEqual([101, 102, 103, 104, 105])
    expect(lastPage.next_commitment_timestamp).toBe(0)
  })

  it('lists updates without key material', async () => {
    await update('alice@example.com', 'gmail')

    expect(await backend.listUpdate(context, {start_commitment_timestamp: 0n, page_size: 0})).toEqual({
      updates: [{commitment_timestamp: 1, epoch: 1, user_id: 'alice@example.com', app_id: 'gmail'}],
      next_commitment_timestamp: 0
    })
  })

  it('chains signed epoch head roots over the steps', async () => {
    await update('alice@example.com')
    await update('bob@example.com')

    const {steps} = await backend.listSteps(context, {start_commitment_timestamp: 0n, page_size: 0})
    const {heads, next_epoch} = await backend.listSEH(context, {start_epoch: 0n, page_size: 0})

    expect(next_epoch).toBe(0)
    expect(heads.map(head => head.epoch)).toEqual([1, 2])
    expect(heads[0]?.issue_time).toEqual({seconds: 1767323045, nanos: 678000000})
    expect(heads[0]?.root_hash).toBe(sha256Hex(steps[0]?.entry_digest ?? ''))
    expect(heads[1]?.root_hash).toBe(sha256Hex(`${heads[0]?.root_hash ?? ''}${steps[1]?.entry_digest ?? ''}`))

    const later = await backend.listSEH(context, {start_epoch: 2n, page_size: 0})
    expect(later.heads.map(head => head.epoch)).toEqual([2])
  })

  it('serves HKP get lookups as armored keys', async () => {
    await update('alice@example.com')

    expect(await backend.hkpLookup(context, {op: 'get', search: 'alice@example.com', options: ''})).toEqual({
      content_type: 'application/pgp-keys',
      body: '-----BEGIN PGP PUBLIC KEY BLOCK-----\n\ndGVzdC1rZXk=\n-----END PGP PUBLIC KEY BLOCK-----\n'
    })
    expect(await backend.hkpLookup(context, {op: 'get', search: 'alice@example.com', options: 'mr'})).toMatchObject({
      content_type: 'text/plain'
    })
  })

  it('rejects unsupported or incomplete HKP lookups', async () => {
    await expect(
      backend.hkpLookup(context, {op: 'index', search: 'alice@example.com', options: ''})
    ).rejects.toMatchObject({code: 'unimplemented'})
    await expect(backend.hkpLookup(context, {op: 'get', search: '', options: ''})).rejects.toMatchObject({
      code: 'invalid_argument'
    })
    await expect(
      backend.hkpLookup(context, {op: 'get', search: 'nobody@example.com', options: ''})
    ).rejects.toMatchObject({code: 'not_found'})
  })
})

describe('armorPublicKey', () => {
  it('wraps key data at 64 characters', () => {
    const keyData = `${'A'.repeat(64)}${'B'.repeat(16)}`

    expect(armorPublicKey(keyData).split('\n')).toEqual([
      '-----BEGIN PGP PUBLIC KEY BLOCK-----',
      '',
      'A'.repeat(64),
      'B'.repeat(16),
      '-----END PGP PUBLIC KEY BLOCK-----',
      ''
    ])
  })
})
