import "@fastify/jwt";

declare module "@fastify/jwt" {
  interface FastifyJWT {
    payload: { uid: string };
    user: { uid: string };
  }
}
