import { NextFunction } from "express";
import { createIdentityExtractor, withAuthUser } from "./identity";
import { TokenCodec } from "./token";
import { Unauthorized } from "../errors";
import { asResponse, mockRequest, mockResponse } from "../__tests__/helpers";

describe("Identity extraction", () => {
  const USER_ID = "1802d2f8-1a18-43c1-9c58-1c3f7100c842";
  const NOW_SEC = 1767225600;
  const codec = new TokenCodec({ signingKey: "test-secret", lifetimeHours: 1, clock: () => new Date(NOW_SEC * 1000) });

  const extractorFor = (identity: string | undefined) =>
    createIdentityExtractor(codec, { getOpaqueIdentity: () => identity });

  describe("createIdentityExtractor", () => {
    it("builds an AuthUser from a valid token", async () => {
      const token = await codec.create({ user_id: USER_ID, email: "a@b.com", expires_at: NOW_SEC + 3600 });

      await expect(extractorFor(token)(mockRequest())).resolves.toEqual({ id: USER_ID, email: "a@b.com" });
    });

    it("rejects when no identity is present", async () => {
      await expect(extractorFor(undefined)(mockRequest())).rejects.toBeInstanceOf(Unauthorized);
    });

    it("rejects invalid and expired tokens", async () => {
      const expired = await codec.create({ user_id: USER_ID, email: "a@b.com", expires_at: NOW_SEC - 1 });

      await expect(extractorFor("garbage")(mockRequest())).rejects.toBeInstanceOf(Unauthorized);
      await expect(extractorFor(expired)(mockRequest())).rejects.toBeInstanceOf(Unauthorized);
    });

    it("lets unexpected codec errors through", async () => {
      const extract = createIdentityExtractor(
        { decode: () => Promise.reject(new Error("boom")) },
        { getOpaqueIdentity: () => "token" }
      );

      await expect(extract(mockRequest())).rejects.toThrow("boom");
    });
  });

  describe("withAuthUser", () => {
    it("passes the AuthUser to the handler", async () => {
      const handler = jest.fn().mockResolvedValue(undefined);
      const next: NextFunction = jest.fn();
      const user = { id: USER_ID, email: "a@b.com" };
      const req = mockRequest();
      const res = asResponse(mockResponse());

      await withAuthUser(() => Promise.resolve(user), handler)(req, res, next);

      expect(handler).toHaveBeenCalledWith(req, res, user);
      expect(next).not.toHaveBeenCalled();
    });

    it("forwards Unauthorized to next without running the handler", async () => {
      const handler = jest.fn();
      const next = jest.fn();

      await withAuthUser(extractorFor(undefined), handler)(mockRequest(), asResponse(mockResponse()), next);

      expect(handler).not.toHaveBeenCalled();
      expect(next).toHaveBeenCalledWith(expect.any(Unauthorized));
    });
  });
});
