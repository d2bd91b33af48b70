import { describe, expect, it } from 'vitest'
import { ValidationError } from '../errors'
import { createStock, describeStock, stockToRecord } from '../stock'
import { createTrade, describeTrade, tradeToRecord, TradeType } from '../trade'
import { createUser, describeUser, userToRecord } from '../user'

describe('User', () => {
  it('rejects empty credentials with both messages', () => {
    expect(() => createUser({ email: '', password: '', name: 'Nobody' })).toThrow(
      new ValidationError('User', ['Email cannot be empty', 'Password cannot be empty'])
    )
  })

  it('allows a blank display name', () => {
    expect(createUser({ email: 'a@example.com', password: 'test-secret', name: '' }).name).toBe('')
  })

  it('describes itself without the password', () => {
    const user = createUser({ email: 'a@example.com', password: 'test-secret', name: 'Ann' })

    expect(describeUser(user)).toBe("User(email='a@example.com', name='Ann')")
    expect(userToRecord(user)).toEqual({ email: 'a@example.com', password: 'test-secret', name: 'Ann' })
  })

  it('is frozen', () => {
    expect(Object.isFrozen(createUser({ email: 'a@example.com', password: 'test-secret', name: 'Ann' }))).toBe(true)
  })
})

describe('Trade', () => {
  it('rejects an empty symbol', () => {
    expect(() => createTrade({ symbol: '', quantity: 1, tradeType: TradeType.Buy })).toThrow(
      'Invalid Trade: Symbol cannot be empty'
    )
  })

  it('rejects zero and negative quantities', () => {
    expect(() => createTrade({ symbol: 'AAPL', quantity: 0, tradeType: TradeType.Buy })).toThrow(
      'Invalid Trade: Quantity must be positive'
    )
    expect(() => createTrade({ symbol: 'AAPL', quantity: -5, tradeType: TradeType.Sell })).toThrow(
      'Invalid Trade: Quantity must be positive'
    )
  })

  it('rejects fractional quantities', () => {
    expect(() => createTrade({ symbol: 'AAPL', quantity: 1.5, tradeType: TradeType.Buy })).toThrow(
      'Invalid Trade: Quantity must be a whole number'
    )
  })

  it('renders a snake_case record', () => {
    const trade = createTrade({
      symbol: 'AAPL',
      quantity: 10,
      tradeType: TradeType.Buy,
      price: 150,
      timestamp: new Date('2024-03-01T10:00:00.000Z'),
    })

    expect(tradeToRecord(trade)).toEqual({
      symbol: 'AAPL',
      quantity: 10,
      trade_type: 'BUY',
      price: 150,
      total_amount: null,
      timestamp: '2024-03-01T10:00:00.000Z',
      fees: null,
    })
  })

  it('describes priced and market orders', () => {
    expect(describeTrade(createTrade({ symbol: 'AAPL', quantity: 10, tradeType: TradeType.Buy, price: 150 }))).toBe(
      'Trade(BUY 10 AAPL @ $150)'
    )
    expect(describeTrade(createTrade({ symbol: 'MSFT', quantity: 1, tradeType: TradeType.Sell }))).toBe(
      'Trade(SELL 1 MSFT @ market)'
    )
  })
})

describe('Stock', () => {
  it('rejects an empty symbol', () => {
    expect(() => createStock({ symbol: '' })).toThrow('Invalid Stock: Symbol cannot be empty')
  })

  it('renders nulls for unknown fields', () => {
    expect(stockToRecord(createStock({ symbol: 'NVDA', quantity: 5, costBasis: 400 }))).toEqual({
      symbol: 'NVDA',
      name: null,
      price: null,
      quantity: 5,
      value: null,
      cost_basis: 400,
      profit_loss: null,
      profit_loss_percentage: null,
    })
  })

  it('marks unknown quantity and price', () => {
    expect(describeStock(createStock({ symbol: 'AAPL', quantity: 5, price: 190.5 }))).toBe(
      'Stock(AAPL: 5 shares @ $190.5)'
    )
    expect(describeStock(createStock({ symbol: 'TSLA' }))).toBe('Stock(TSLA: ? shares @ $?)')
  })
})
