import { z } from 'zod'
import { ValidationError } from './errors'

export const userSchema = z.object({
  email: z.string().min(1, 'Email cannot be empty'),
  password: z.string().min(1, 'Password cannot be empty'),
  // Some flows (e.g. ad hoc credential checks) log in without a display name.
  name: z.string(),
  token: z.string().optional(),
})

export type User = Readonly<z.infer<typeof userSchema>>

export interface UserRecord {
  email: string
  password: string
  name: string
}

export function createUser(input: z.input<typeof userSchema>): User {
  const result = userSchema.safeParse(input)
  if (!result.success) throw ValidationError.fromZod('User', result.error)
  return Object.freeze(result.data)
}

export function userToRecord(user: User): UserRecord {
  return { email: user.email, password: user.password, name: user.name }
}

/** Safe for logs and test titles: the password is never included. */
export function describeUser(user: User): string {
  return `User(email='${user.email}', name='${user.name}')`
}
