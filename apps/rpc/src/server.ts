import Fastify from "fastify";
import { registerRpc, type RegisterRpcOptions } from "./rpc";

declare module "fastify" {
  interface FastifyRequest {
    rawBody?: string;
  }
}

export function buildServer(options: RegisterRpcOptions, serverOptions: { logger?: boolean } = {}) {
  const app = Fastify({ logger: serverOptions.logger ?? true });

  app.addContentTypeParser<string>("application/json", { parseAs: "string" }, (req, body, done) => {
    req.rawBody = body;
    try {
      done(null, JSON.parse(body));
    } catch (error) {
      const parseError = error instanceof Error ? error : new Error(String(error));
      done(Object.assign(parseError, { statusCode: 400 }), undefined);
    }
  });

  registerRpc(app, options);
  return app;
}
