export { ValidationError } from './errors'
export { createUser, describeUser, userToRecord } from './user'
export type { User, UserRecord } from './user'
export { TradeType, createTrade, describeTrade, tradeToRecord } from './trade'
export type { Trade, TradeRecord } from './trade'
export { createStock, describeStock, stockToRecord } from './stock'
export type { Stock, StockRecord } from './stock'
