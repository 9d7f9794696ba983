import type { FastifyReply, FastifyRequest } from "fastify";

export async function requestLogger(request: FastifyRequest) {
  console.log(`[${new Date().toISOString()}] <- ${request.method} ${request.url}`);
}

export async function responseLogger(request: FastifyRequest, reply: FastifyReply) {
  const user = request.visitor?.user;
  const who = user ? `user:${user.id}` : "anonymous";
  const ms = Math.round(reply.elapsedTime);
  console.log(
    `[${new Date().toISOString()}] -> ${request.method} ${request.url} ${reply.statusCode} (${who}) in ${ms}ms`
  );
}
