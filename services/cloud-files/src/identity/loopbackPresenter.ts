import express from "express";
import type { Server } from "http";
import { z } from "zod";
import { Logger, type LoggerService } from "../logger.js";
import type { ConsentPresenter, ConsentResponse } from "./types.js";

export const CALLBACK_PATH = "/oauth2/callback";

const callbackQuerySchema = z.object({
  code: z.string().min(1).optional(),
  state: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional()
});

export class ConsentDeniedError extends Error {
  constructor(readonly reason: string, description?: string) {
    super(description ? `consent denied: ${reason} (${description})` : `consent denied: ${reason}`);
    this.name = "ConsentDeniedError";
  }
}

type LoopbackPresenterOptions = {
  port: number;
  host?: string;
  /** Shows the consent URL to the user, for instance by printing it. */
  onAuthorizationUrl: (url: string) => void | Promise<void>;
  logger?: LoggerService;
};

/**
 * Receives the OAuth redirect on a short-lived local listener. Each `present`
 * call opens its own listener and closes it once the callback has been handled.
 */
export class LoopbackConsentPresenter implements ConsentPresenter {
  private readonly host: string;
  private readonly logger: LoggerService;

  constructor(private readonly options: LoopbackPresenterOptions) {
    this.host = options.host ?? "127.0.0.1";
    this.logger = options.logger ?? Logger;
  }

  present(buildAuthorizationUrl: (redirectUri: string) => string): Promise<ConsentResponse> {
    return new Promise<ConsentResponse>((resolve, reject) => {
      const app = express();
      let settled = false;
      let redirectUri = "";

      const finish = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        server.close();
        outcome();
      };

      app.get(CALLBACK_PATH, (req, res) => {
        res.set("Connection", "close");
        const parsed = callbackQuerySchema.safeParse(req.query);
        if (!parsed.success) {
          res.status(400).send("Invalid callback parameters.");
          return;
        }

        const { code, state, error, error_description: description } = parsed.data;
        if (error) {
          res.status(400).send("Authorization was not granted. You can close this window.");
          finish(() => reject(new ConsentDeniedError(error, description)));
          return;
        }
        if (!code) {
          res.status(400).send("Missing authorization code.");
          return;
        }

        res.send("Authorization complete. You can close this window.");
        finish(() => resolve({ code, state: state ?? "", redirectUri }));
      });

      const server: Server = app.listen(this.options.port, this.host, () => {
        const address = server.address();
        const port = address && typeof address === "object" ? address.port : this.options.port;
        redirectUri = `http://${this.host}:${port}${CALLBACK_PATH}`;
        this.logger.debug("consent", "listening for OAuth redirect", { redirectUri });

        Promise.resolve()
          .then(() => this.options.onAuthorizationUrl(buildAuthorizationUrl(redirectUri)))
          .catch((error: unknown) => finish(() => reject(error)));
      });

      server.on("error", (error) => finish(() => reject(error)));
    });
  }
}
