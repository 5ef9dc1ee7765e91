import { Agent } from "undici";

const agents = new Map<string, Agent>();

/**
 * One keep-alive agent per TLS mode, shared by every request in the process.
 */
export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent {
  const key = ignoreHttpsErrors ? "insecure" : "default";
  let agent = agents.get(key);
  if (!agent) {
    agent = new Agent({
      connect: {
        rejectUnauthorized: !ignoreHttpsErrors,
      },
    });
    agents.set(key, agent);
  }
  return agent;
}

export async function closeFetchDispatchers(): Promise<void> {
  const open = [...agents.values()];
  agents.clear();
  await Promise.all(open.map((agent) => agent.close()));
}
