/**
 * Domain fixtures shared by tests
 */

import { z } from "zod";

export const UserSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: z.enum(["Active", "Inactive"]),
  team: z.string().optional(),
  bio: z.string().optional(),
});

export type User = z.infer<typeof UserSchema>;

/**
 * Build a user, numbered so ids sort in creation order
 */
export function makeUser(n: number, overrides: Partial<User> = {}): User {
  const id = `u${String(n).padStart(3, "0")}`;
  return { id, name: `User ${n}`, status: "Active", ...overrides };
}

export function makeUsers(count: number, overrides: Partial<User> = {}): User[] {
  return Array.from({ length: count }, (_, i) => makeUser(i + 1, overrides));
}

export const getUserId = (user: User): string => user.id;
