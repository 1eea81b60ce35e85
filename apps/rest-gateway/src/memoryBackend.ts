import {createHash} from 'node:crypto'

import {
  EntrySchema,
  SignedEpochHeadSchema,
  type Entry,
  type GetEntryRequest,
  type GetEntryResponse,
  type HkpLookupRequest,
  type HttpBody,
  type ListEntryHistoryRequest,
  type ListEntryHistoryResponse,
  type ListSEHRequest,
  type ListSEHResponse,
  type ListStepsRequest,
  type ListStepsResponse,
  type ListUpdateRequest,
  type ListUpdateResponse,
  type SignedEpochHead,
  type Step,
  type UpdateEntryRequest,
  type UpdateEntryResponse
} from '@keyserver-rest/schemas'

import {BackendError, type KeyServerBackend, type RequestContext} from './backend'

export const DEFAULT_PAGE_SIZE = 10
export const MAX_PAGE_SIZE = 100

const ARMOR_LINE_LENGTH = 64

const resolvePageSize = (pageSize: number) => {
  if (pageSize === 0) {
    return DEFAULT_PAGE_SIZE
  }

  return Math.min(pageSize, MAX_PAGE_SIZE)
}

const paginate = <T>({
  items,
  position,
  start,
  pageSize
}: {
  items: readonly T[]
  position: (item: T) => number
  start: bigint
  pageSize: number
}) => {
  const size = resolvePageSize(pageSize)
  const remaining = items.filter(item => BigInt(position(item)) >= start)
  const next = remaining[size]

  return {
    page: remaining.slice(0, size),
    next: next === undefined ? 0 : position(next)
  }
}

const sha256Hex = (value: string) => createHash('sha256').update(value, 'utf8').digest('hex')

const toTimestamp = (date: Date) => {
  const millis = date.getTime()
  const seconds = Math.floor(millis / 1000)
  return {seconds, nanos: (millis - seconds * 1000) * 1_000_000}
}

// RFC 9580 makes the armor checksum optional, so none is emitted.
export const armorPublicKey = (keyData: string) => {
  const lines: string[] = []
  for (let offset = 0; offset < keyData.length; offset += ARMOR_LINE_LENGTH) {
    lines.push(keyData.slice(offset, offset + ARMOR_LINE_LENGTH))
  }

  return ['-----BEGIN PGP PUBLIC KEY BLOCK-----', '', ...lines, '-----END PGP PUBLIC KEY BLOCK-----', ''].join('\n')
}

/**
 * Process-local key server. Every accepted update opens a new epoch with a
 * single step, so epochs and commitment timestamps advance together.
 */
export class InMemoryKeyServerBackend implements KeyServerBackend {
  private readonly entries: Entry[] = []
  private readonly steps: Step[] = []
  private readonly heads: SignedEpochHead[] = []
  private readonly now: () => Date

  public constructor({now = () => new Date()}: {now?: () => Date} = {}) {
    this.now = now
  }

  public async getEntry(_context: RequestContext, request: GetEntryRequest): Promise<GetEntryResponse> {
    const entry = this.findNewestEntry(request)
    if (!entry) {
      throw new BackendError({code: 'not_found', message: `No entry for user ${request.user_id}`})
    }

    return structuredClone(entry)
  }

  public async hkpLookup(_context: RequestContext, request: HkpLookupRequest): Promise<HttpBody> {
    if (request.op !== 'get') {
      throw new BackendError({code: 'unimplemented', message: `HKP operation "${request.op}" is not supported`})
    }

    if (request.search.length === 0) {
      throw new BackendError({code: 'invalid_argument', message: 'HKP search is required'})
    }

    const entry = this.findNewestEntry({user_id: request.search, app_id: '', epoch: 0n})
    if (!entry) {
      throw new BackendError({code: 'not_found', message: `No key for ${request.search}`})
    }

    const options = request.options.split(',').map(option => option.trim())
    return {
      content_type: options.includes('mr') ? 'text/plain' : 'application/pgp-keys',
      body: armorPublicKey(entry.signed_key.key.key_data)
    }
  }

  public async listEntryHistory(
    _context: RequestContext,
    request: ListEntryHistoryRequest
  ): Promise<ListEntryHistoryResponse> {
    this.requireUserId(request.user_id)

    const {page, next} = paginate({
      items: this.entries.filter(entry => entry.user_id === request.user_id),
      position: entry => entry.epoch,
      start: request.start_epoch,
      pageSize: request.page_size
    })

    return {values: structuredClone(page), next_epoch: next}
  }

  public async updateEntry(_context: RequestContext, request: UpdateEntryRequest): Promise<UpdateEntryResponse> {
    this.requireUserId(request.user_id)
    if (!request.signed_key) {
      throw new BackendError({code: 'invalid_argument', message: 'signed_key is required'})
    }

    const epoch = this.heads.length + 1
    const entry = EntrySchema.parse({
      user_id: request.user_id,
      app_id: request.signed_key.key.app_id,
      epoch,
      commitment_timestamp: epoch,
      signed_key: structuredClone(request.signed_key)
    })
    const step: Step = {
      commitment_timestamp: entry.commitment_timestamp,
      epoch,
      user_id: entry.user_id,
      entry_digest: sha256Hex(JSON.stringify(entry))
    }
    const previousRoot = this.heads.at(-1)?.root_hash ?? ''

    this.entries.push(entry)
    this.steps.push(step)
    this.heads.push(
      SignedEpochHeadSchema.parse({
        epoch,
        issue_time: toTimestamp(this.now()),
        root_hash: sha256Hex(`${previousRoot}${step.entry_digest}`)
      })
    )

    return {user_id: entry.user_id, epoch, commitment_timestamp: entry.commitment_timestamp}
  }

  public async listSEH(_context: RequestContext, request: ListSEHRequest): Promise<ListSEHResponse> {
    const {page, next} = paginate({
      items: this.heads,
      position: head => head.epoch,
      start: request.start_epoch,
      pageSize: request.page_size
    })

    return {heads: structuredClone(page), next_epoch: next}
  }

  public async listUpdate(_context: RequestContext, request: ListUpdateRequest): Promise<ListUpdateResponse> {
    const {page, next} = paginate({
      items: this.entries,
      position: entry => entry.commitment_timestamp,
      start: request.start_commitment_timestamp,
      pageSize: request.page_size
    })

    return {
      updates: page.map(entry => ({
        commitment_timestamp: entry.commitment_timestamp,
        epoch: entry.epoch,
        user_id: entry.user_id,
        app_id: entry.app_id
      })),
      next_commitment_timestamp: next
    }
  }

  public async listSteps(_context: RequestContext, request: ListStepsRequest): Promise<ListStepsResponse> {
    const {page, next} = paginate({
      items: this.steps,
      position: step => step.commitment_timestamp,
      start: request.start_commitment_timestamp,
      pageSize: request.page_size
    })

    return {steps: structuredClone(page), next_commitment_timestamp: next}
  }

  private requireUserId(userId: string) {
    if (userId.length === 0) {
      throw new BackendError({code: 'invalid_argument', message: 'user_id is required'})
    }
  }

  private findNewestEntry({user_id, app_id, epoch}: GetEntryRequest) {
    this.requireUserId(user_id)

    const matching = this.entries.filter(
      entry =>
        entry.user_id === user_id &&
        (app_id.length === 0 || entry.app_id === app_id) &&
        (epoch === 0n || BigInt(entry.epoch) <= epoch)
    )

    return matching.at(-1)
  }
}
