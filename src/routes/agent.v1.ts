import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { getAgentCard, runAgent } from "../search/agent.js";
import { RecordingResponseContext } from "../search/response-context.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

export const AgentRunInput = z.object({
  request: z.string().trim().min(1).max(4000),
  entrypoint: z.string().min(1),
});

export type AgentRunInputT = z.infer<typeof AgentRunInput>;

export default async function route(app: FastifyInstance) {
  app.get("/agent/v1/card", async () => getAgentCard());

  app.post("/agent/v1/run", async (req, reply) => {
    const requestId = getRequestId(req);

    const parsed = AgentRunInput.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, requestId));
    }

    const { request, entrypoint } = parsed.data;
    const context = new RecordingResponseContext(requestId);
    await runAgent(context, request, entrypoint, { requestId });

    return {
      request_id: requestId,
      entrypoint,
      messages: context.messages,
    };
  });
}
