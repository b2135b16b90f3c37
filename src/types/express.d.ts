// src/types/express.d.ts
declare global {
  namespace Express {
    interface Request {
      id?: string; // set by requestIdMiddleware
    }
  }
}

export { };
