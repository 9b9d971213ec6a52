import type { FastifyInstance } from "fastify";
import { registerChatRoutes, type ChatRoutesDependencies } from "./chat.js";
import { registerQueryRoutes, type QueryRoutesDependencies } from "./query.js";
import { registerSessionRoutes, type SessionRoutesDependencies } from "./sessions.js";

export interface ApiRoutesDependencies {
  chat?: ChatRoutesDependencies;
  query?: QueryRoutesDependencies;
  sessions?: SessionRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerQueryRoutes(app, dependencies?.query);
  await registerChatRoutes(app, dependencies?.chat);
  await registerSessionRoutes(app, dependencies?.sessions);
}
