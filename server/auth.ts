import type { Request, Response, NextFunction, RequestHandler } from "express";
import passport from "passport";
import { BasicStrategy } from "passport-http";
import { scrypt, randomBytes, timingSafeEqual } from "crypto";
import { promisify } from "util";
import type { Device } from "@shared/schema";
import type { IStorage } from "./storage";
import { AppError, ErrorCode, toAppError } from "./error-handling";

declare global {
  namespace Express {
    // the authenticated principal is always a device
    interface User extends Device {}
  }
}

const scryptAsync = promisify(scrypt);

export async function hashPassword(password: string) {
  const salt = randomBytes(16).toString("hex");
  const buf = (await scryptAsync(password, salt, 64)) as Buffer;
  return `${buf.toString("hex")}.${salt}`;
}

export async function comparePasswords(supplied: string, stored: string) {
  const [hashed, salt] = stored.split(".");
  if (!hashed || !salt) return false;
  const hashedBuf = Buffer.from(hashed, "hex");
  const suppliedBuf = (await scryptAsync(supplied, salt, 64)) as Buffer;
  if (hashedBuf.length !== suppliedBuf.length) return false;
  return timingSafeEqual(hashedBuf, suppliedBuf);
}

/**
 * Device lookup for the Basic strategy. Undefined for unknown devices or a
 * wrong password; FORBIDDEN for a deactivated device.
 */
export async function verifyDevice(
  storage: IStorage,
  deviceCode: string,
  password: string
): Promise<Device | undefined> {
  const auth = await storage.getDeviceAuth(deviceCode);
  if (!auth || !(await comparePasswords(password, auth.passwordHash))) {
    console.warn(`[Auth] Rejected credentials for ${deviceCode}`);
    return undefined;
  }

  const device = await storage.getDevice(auth.deviceId);
  if (device && !device.isActive) {
    throw new AppError(ErrorCode.FORBIDDEN, undefined, { reason: "inactive" });
  }
  return device;
}

function sendError(res: Response, error: AppError) {
  if (error.code === ErrorCode.UNAUTHORIZED) {
    res.setHeader("WWW-Authenticate", 'Basic realm="devices"');
  }
  res.status(error.getStatusCode()).json(error.toJSON());
}

/**
 * HTTP Basic authentication with deviceCode:password.
 * 401 for unknown devices or wrong passwords, 403 for inactive devices.
 */
export function requireDevice(storage: IStorage): RequestHandler {
  const authenticator = new passport.Authenticator();
  authenticator.use(
    new BasicStrategy((deviceCode, password, done) => {
      verifyDevice(storage, deviceCode, password).then(
        (device) => done(null, device ?? false),
        (error: unknown) => done(error)
      );
    })
  );

  return (req: Request, res: Response, next: NextFunction) => {
    authenticator.authenticate(
      "basic",
      { session: false },
      (error: unknown, device: Express.User | false | null | undefined) => {
        if (error) {
          return sendError(res, toAppError(error));
        }
        if (!device) {
          return sendError(res, new AppError(ErrorCode.UNAUTHORIZED));
        }
        req.user = device;
        next();
      }
    )(req, res, next);
  };
}

/** 403 unless the :deviceCode path parameter names the authenticated device. */
export function requireSameDevice(req: Request, res: Response, next: NextFunction) {
  if (!req.user || req.params.deviceCode !== req.user.deviceCode) {
    return sendError(res, new AppError(ErrorCode.FORBIDDEN));
  }
  next();
}

/** The device attached by requireDevice. */
export function authenticatedDevice(req: Request): Device {
  if (!req.user) {
    throw new AppError(ErrorCode.UNAUTHORIZED);
  }
  return req.user;
}
