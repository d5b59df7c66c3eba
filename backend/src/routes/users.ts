// src/routes/users.ts
import crypto from "crypto";
import { Router } from "express";
import { CreateUserDto, UpdateUserDto, Uuid, toUserResponse } from "../types/dto";
import { NotFound } from "../errors";
import { UserRepository } from "../db/users";
import { maybeNotModified } from "../db/etag";
import { PasswordHasher } from "../auth/password";
import { IdentityExtractor, withAuthUser } from "../auth/identity";
import { ROUTES } from "./paths";

export interface UserRouteDeps {
  users: UserRepository;
  hasher: PasswordHasher;
  identity: IdentityExtractor;
}

/** Unparseable ids are reported the same way as unknown ones. */
function userId(raw: string): string {
  const parsed = Uuid.safeParse(raw);
  if (!parsed.success) throw new NotFound(`User ${raw} not found`);
  return parsed.data;
}

export default function userRoutes({ users, hasher, identity }: UserRouteDeps): Router {
  const r = Router();

  // List
  r.get(ROUTES.listUsers.path, async (req, res, next) => {
    try {
      const body = (await users.findAll()).map(toUserResponse);
      if (maybeNotModified(req, res, body)) return;
      res.json(body);
    } catch (e) { next(e); }
  });

  // Get one
  r.get(ROUTES.getUser.path, async (req, res, next) => {
    try {
      const id = userId(req.params.id);
      const user = await users.findById(id);
      if (!user) throw new NotFound(`User ${id} not found`);
      const body = toUserResponse(user);
      if (maybeNotModified(req, res, body)) return;
      res.json(body);
    } catch (e) { next(e); }
  });

  // Create (fresh record salt, digest bound to the server secret)
  r.post(ROUTES.createUser.path, withAuthUser(identity, async (req, res, actor) => {
    const dto = CreateUserDto.parse(req.body);
    const salt = hasher.generateSalt();
    const created = await users.create({
      id: crypto.randomUUID(),
      first_name: dto.first_name,
      last_name: dto.last_name,
      email: dto.email,
      password: await hasher.hash(dto.password, salt),
      salt,
      created_by: actor.id,
      updated_by: actor.id
    });
    res.status(201).json(toUserResponse(created));
  }));

  // Update
  r.put(ROUTES.updateUser.path, withAuthUser(identity, async (req, res, actor) => {
    const id = userId(req.params.id);
    const dto = UpdateUserDto.parse(req.body);
    const updated = await users.update(id, { ...dto, updated_by: actor.id });
    if (!updated) throw new NotFound(`User ${id} not found`);
    res.json(toUserResponse(updated));
  }));

  // Delete
  r.delete(ROUTES.deleteUser.path, async (req, res, next) => {
    try {
      const id = userId(req.params.id);
      if (!(await users.delete(id))) throw new NotFound(`User ${id} not found`);
      res.json({ id, deleted: true });
    } catch (e) { next(e); }
  });

  return r;
}
