import Fastify from "fastify";
import { errorHandler, loadVisitor, requestLogger, responseLogger } from "./middleware";
import { setupRouteHandlers } from "./handlers/routes";

export function createApp() {
  const app = Fastify({ logger: false });

  // Error handling
  app.setErrorHandler(errorHandler);

  // Logging
  app.addHook("onRequest", requestLogger);
  app.addHook("onResponse", responseLogger);

  // Visitor session (anonymous or signed in)
  app.addHook("onRequest", loadVisitor);

  setupRouteHandlers(app);

  return app;
}

export type App = ReturnType<typeof createApp>;
