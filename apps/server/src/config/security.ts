import { validateEnv } from "@shared/env";
import cors from "cors";
import { type Express } from "express";
import helmet from "helmet";

const env = validateEnv(process.env);

const allowedOrigins = new Set([env.APP_ORIGIN]);

export function setupSecurity(app: Express) {
  const isProd = env.NODE_ENV === "production";

  // The API serves JSON only; CSP matters once a UI is served from the same origin
  if (isProd) {
    app.use(
      helmet({
        contentSecurityPolicy: {
          useDefaults: true,
          directives: {
            "connect-src": ["'self'", ...Array.from(allowedOrigins)],
            "img-src": ["'self'", "data:", "https:"],
          },
        },
      }),
    );
  } else {
    app.use(
      helmet({
        contentSecurityPolicy: false,
      }),
    );
  }

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin) {
          return callback(null, true);
        }
        if (allowedOrigins.has(origin)) {
          return callback(null, true);
        }
        const isLocalDev =
          !isProd && (origin.startsWith("http://localhost:") || origin.startsWith("http://127.0.0.1:"));
        if (isLocalDev) {
          return callback(null, true);
        }
        return callback(new Error(`Origin ${origin} not allowed by CORS`));
      },
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    }),
  );
}
