// src/db/users.ts
import { DatabaseError } from "pg";
import { BadRequest } from "../errors";
import { Query } from "./index";
import { SQL } from "./sql";

/** A users row as the API sees it (no password digest, no salt). */
export interface UserRecord {
  id: string;
  first_name: string;
  last_name: string;
  email: string;
  created_by: string;
  created_at: Date;
  updated_by: string;
  updated_at: Date;
}

export interface NewUserRecord {
  id: string;
  first_name: string;
  last_name: string;
  email: string;
  password: string; // hex digest
  salt: string;     // per-record salt
  created_by: string;
  updated_by: string;
}

/** A users row with its stored digest and record salt, for login. */
export interface LoginRecord extends UserRecord {
  password: string;
  salt: string;
}

export interface UserChanges {
  first_name: string;
  last_name: string;
  email: string;
  updated_by: string;
}

/** Persistence the handlers depend on. */
export interface UserRepository {
  findAll(): Promise<UserRecord[]>;
  findById(id: string): Promise<UserRecord | null>;
  findLoginByEmail(email: string): Promise<LoginRecord | null>;
  create(user: NewUserRecord): Promise<UserRecord>;
  update(id: string, changes: UserChanges): Promise<UserRecord | null>;
  delete(id: string): Promise<boolean>;
}

const UNIQUE_VIOLATION = "23505";

export class PgUserRepository implements UserRepository {
  constructor(private readonly q: Query) {}

  async findAll(): Promise<UserRecord[]> {
    const { rows } = await this.q<UserRecord>(SQL.selectUsers);
    return rows;
  }

  async findById(id: string): Promise<UserRecord | null> {
    const { rows } = await this.q<UserRecord>(SQL.selectUserById, [id]);
    return rows[0] ?? null;
  }

  async findLoginByEmail(email: string): Promise<LoginRecord | null> {
    const { rows } = await this.q<LoginRecord>(SQL.selectLoginByEmail, [email]);
    return rows[0] ?? null;
  }

  async create(u: NewUserRecord): Promise<UserRecord> {
    try {
      const { rows } = await this.q<UserRecord>(SQL.insertUser, [
        u.id, u.first_name, u.last_name, u.email, u.password, u.salt, u.created_by, u.updated_by
      ]);
      return rows[0];
    } catch (e) {
      throw uniqueViolation(e) ?? e;
    }
  }

  async update(id: string, c: UserChanges): Promise<UserRecord | null> {
    try {
      const { rows } = await this.q<UserRecord>(SQL.updateUser, [id, c.first_name, c.last_name, c.email, c.updated_by]);
      return rows[0] ?? null;
    } catch (e) {
      throw uniqueViolation(e) ?? e;
    }
  }

  async delete(id: string): Promise<boolean> {
    const { rows } = await this.q<{ id: string }>(SQL.deleteUser, [id]);
    return rows.length > 0;
  }
}

function uniqueViolation(e: unknown): BadRequest | undefined {
  if (e instanceof DatabaseError && e.code === UNIQUE_VIOLATION) {
    return new BadRequest(e.detail ?? e.message);
  }
  return undefined;
}
