// src/routes/auth.ts
import { Router } from "express";
import { LoginDto, toUserResponse } from "../types/dto";
import { Unauthorized } from "../errors";
import { logger } from "../logger";
import { UserRepository } from "../db/users";
import { PasswordHasher } from "../auth/password";
import { SessionTransport } from "../auth/session";
import { TokenCodec } from "../auth/token";
import { IdentityExtractor, withAuthUser } from "../auth/identity";
import { ROUTES } from "./paths";

// hashed against when the email is unknown, so both failures cost the same
const DUMMY_SALT = "0000000000000000";

export interface AuthRouteDeps {
  users: UserRepository;
  hasher: PasswordHasher;
  codec: TokenCodec;
  transport: SessionTransport;
  identity: IdentityExtractor;
}

export default function authRoutes({ users, hasher, codec, transport, identity }: AuthRouteDeps): Router {
  const r = Router();

  // Login: verify the digest, mint a session token, hand it to the transport
  r.post(ROUTES.login.path, async (req, res, next) => {
    try {
      const dto = LoginDto.parse(req.body);

      const found = await users.findLoginByEmail(dto.email);
      if (!found) {
        await hasher.hash(dto.password, DUMMY_SALT);
        throw new Unauthorized("invalid_login");
      }
      if (!(await hasher.verify(dto.password, found.salt, found.password))) {
        throw new Unauthorized("invalid_login");
      }
      const user = toUserResponse(found);

      const token = await codec.create(codec.claimsFor(user.id, user.email));
      transport.setOpaqueIdentity(res, token);

      logger.info({ user_id: user.id }, "user logged in");
      res.json(user);
    } catch (e) { next(e); }
  });

  // Logout: forget the session token
  r.post(ROUTES.logout.path, (_req, res) => {
    transport.clearOpaqueIdentity(res);
    res.status(200).end();
  });

  r.get(ROUTES.me.path, withAuthUser(identity, async (_req, res, user) => {
    res.json(user);
  }));

  return r;
}
