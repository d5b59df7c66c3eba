// src/types/dto.ts
import { z } from "zod";
import { UserRecord } from "../db/users";

/** Utility */
export const Uuid = z.string().uuid();

const name = (field: string) => {
  const message = `${field} is required and must be at least 3 characters`;
  return z.string({ required_error: message, invalid_type_error: message }).min(3, message).max(100);
};
const email = z
  .string({ required_error: "email must be a valid email", invalid_type_error: "email must be a valid email" })
  .email("email must be a valid email")
  .max(100);
const password = (() => {
  const message = "password is required and must be at least 6 characters";
  return z.string({ required_error: message, invalid_type_error: message }).min(6, message);
})();

/** ---------------- Auth ---------------- */
export const LoginDto = z.object({ email, password });
export type LoginDto = z.infer<typeof LoginDto>;

/** ---------------- Users ---------------- */
export const CreateUserDto = z.object({
  first_name: name("first_name"),
  last_name: name("last_name"),
  email,
  password
});
export type CreateUserDto = z.infer<typeof CreateUserDto>;

export const UpdateUserDto = z.object({
  first_name: name("first_name"),
  last_name: name("last_name"),
  email
});
export type UpdateUserDto = z.infer<typeof UpdateUserDto>;

export interface UserResponse {
  id: string;
  first_name: string;
  last_name: string;
  email: string;
}

export function toUserResponse(u: UserRecord): UserResponse {
  return { id: u.id, first_name: u.first_name, last_name: u.last_name, email: u.email };
}
