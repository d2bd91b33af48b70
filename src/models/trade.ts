import { z } from 'zod'
import { ValidationError } from './errors'

export const TradeType = {
  Buy: 'BUY',
  Sell: 'SELL',
} as const

export type TradeType = (typeof TradeType)[keyof typeof TradeType]

export const tradeSchema = z.object({
  symbol: z.string().min(1, 'Symbol cannot be empty'),
  quantity: z.number().int('Quantity must be a whole number').positive('Quantity must be positive'),
  tradeType: z.enum([TradeType.Buy, TradeType.Sell]),
  price: z.number().optional(),
  totalAmount: z.number().optional(),
  timestamp: z.date().optional(),
  fees: z.number().optional(),
})

export type Trade = Readonly<z.infer<typeof tradeSchema>>

export interface TradeRecord {
  symbol: string
  quantity: number
  trade_type: TradeType
  price: number | null
  total_amount: number | null
  timestamp: string | null
  fees: number | null
}

export function createTrade(input: z.input<typeof tradeSchema>): Trade {
  const result = tradeSchema.safeParse(input)
  if (!result.success) throw ValidationError.fromZod('Trade', result.error)
  return Object.freeze(result.data)
}

export function tradeToRecord(trade: Trade): TradeRecord {
  return {
    symbol: trade.symbol,
    quantity: trade.quantity,
    trade_type: trade.tradeType,
    price: trade.price ?? null,
    total_amount: trade.totalAmount ?? null,
    timestamp: trade.timestamp?.toISOString() ?? null,
    fees: trade.fees ?? null,
  }
}

export function describeTrade(trade: Trade): string {
  const at = trade.price === undefined ? 'market' : `$${trade.price}`
  return `Trade(${trade.tradeType} ${trade.quantity} ${trade.symbol} @ ${at})`
}
