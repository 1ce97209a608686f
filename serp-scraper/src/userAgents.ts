import agents from "../data/user-agents.json";

const USER_AGENTS: readonly string[] = agents;

export function randomUserAgent(random: () => number = Math.random): string {
  const i = Math.floor(random() * USER_AGENTS.length);
  return USER_AGENTS[Math.min(i, USER_AGENTS.length - 1)];
}

export function userAgentCount(): number {
  return USER_AGENTS.length;
}
