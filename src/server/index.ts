import http from "http";
import { createHttpServer, HttpServerDeps } from "./http";

export interface StartServerOptions extends HttpServerDeps {
  port: number;
}

export function startServer(options: StartServerOptions): Promise<http.Server> {
  const app = createHttpServer(options);
  const server = http.createServer(app);
  const logger = options.logger;

  return new Promise((resolve, reject) => {
    // Set error handler BEFORE listen
    server.once("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger?.fatal(`Port ${options.port} is already in use`, { port: options.port });
      }
      reject(error);
    });

    server.listen(options.port, () => {
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : options.port;
      logger?.info("Foreman server is running", {
        http: `http://localhost:${port}`,
        endpoints: ["GET /health", "POST /agent/run", "GET /tools/list"],
      });
      resolve(server);
    });
  });
}
