import type { FastifyInstance } from "fastify";

import type { ControlPlaneStore } from "../store/control_plane_store";

export async function sessionRoutes(
  app: FastifyInstance,
  opts: { store: ControlPlaneStore }
) {
  const { store } = opts;

  app.get<{ Params: { id: string } }>("/sessions/:id", async (req, reply) => {
    const session = await store.getSession(req.params.id);
    if (!session) {
      return reply.code(404).send({ error: "not_found" });
    }

    const [transcript, spans] = await Promise.all([
      store.getMessages(session.id),
      store.getSpans(session.id),
    ]);

    return reply.code(200).send({ session, transcript, spans });
  });
}
