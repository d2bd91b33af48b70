import { z } from 'zod'
import { ValidationError } from './errors'

export const stockSchema = z.object({
  symbol: z.string().min(1, 'Symbol cannot be empty'),
  name: z.string().optional(),
  price: z.number().optional(),
  quantity: z.number().int().optional(),
  value: z.number().optional(),
  costBasis: z.number().optional(),
  profitLoss: z.number().optional(),
  profitLossPercentage: z.number().optional(),
})

export type Stock = Readonly<z.infer<typeof stockSchema>>

export interface StockRecord {
  symbol: string
  name: string | null
  price: number | null
  quantity: number | null
  value: number | null
  cost_basis: number | null
  profit_loss: number | null
  profit_loss_percentage: number | null
}

export function createStock(input: z.input<typeof stockSchema>): Stock {
  const result = stockSchema.safeParse(input)
  if (!result.success) throw ValidationError.fromZod('Stock', result.error)
  return Object.freeze(result.data)
}

export function stockToRecord(stock: Stock): StockRecord {
  return {
    symbol: stock.symbol,
    name: stock.name ?? null,
    price: stock.price ?? null,
    quantity: stock.quantity ?? null,
    value: stock.value ?? null,
    cost_basis: stock.costBasis ?? null,
    profit_loss: stock.profitLoss ?? null,
    profit_loss_percentage: stock.profitLossPercentage ?? null,
  }
}

export function describeStock(stock: Stock): string {
  return `Stock(${stock.symbol}: ${stock.quantity ?? '?'} shares @ $${stock.price ?? '?'})`
}
