import { createUser } from '../models/user'
import type { User } from '../models/user'

const primaryUser = createUser({ email: 'john@example.com', password: 'password123', name: 'John Doe' })
const secondaryUser = createUser({ email: 'jane@example.com', password: 'password123', name: 'Jane Smith' })
const tertiaryUser = createUser({ email: 'bob@example.com', password: 'password123', name: 'Bob Johnson' })

export const TestData = {
  primaryUser,
  secondaryUser,
  tertiaryUser,

  allUsers(): readonly User[] {
    return [primaryUser, secondaryUser, tertiaryUser]
  },

  /** Well-formed credentials the app does not know. */
  invalidUser(): User {
    return createUser({ email: 'invalid@example.com', password: 'wrongpassword', name: 'Invalid User' })
  },

  stockSymbols: ['AAPL', 'GOOGL', 'MSFT', 'TSLA', 'NVDA', 'AMZN', 'META'] as const,

  tradeQuantity: {
    default: 10,
    large: 100,
    small: 1,
  },
} as const
