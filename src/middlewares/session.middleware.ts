import { NextFunction, Request, Response } from "express";
import { DietSession, SessionStore } from "../services/session.service";

export const SESSION_COOKIE = "diet_sid";

export type SessionRequest<TBody> = Request<Record<string, string>, unknown, TBody>;

export type SessionHandler<TBody> = (
  req: SessionRequest<TBody>,
  res: Response,
  session: DietSession
) => Promise<unknown> | unknown;

/**
 * Resolve the caller's session from its cookie, issuing a new one when
 * missing or expired, refresh the cookie, and hand the session to the
 * handler as an argument. The body type is whatever `validateRequest` ran
 * before this handler produced.
 */
export const withSession =
  <TBody = unknown>(
    store: SessionStore,
    handler: SessionHandler<TBody>
  ) =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const cookie: unknown = req.cookies?.[SESSION_COOKIE];
      let session = typeof cookie === "string" ? store.get(cookie) : undefined;

      if (!session) {
        session = store.create();
      }
      // Re-issued on every request so the browser expiry slides with the store's
      res.cookie(SESSION_COOKIE, session.id, {
        httpOnly: true,
        sameSite: "lax",
        maxAge: store.ttlMs,
      });

      await handler(req, res, session);
    } catch (error) {
      next(error);
    }
  };
