export * from './http-contracts'
export * from './request-messages'
export * from './response-messages'
