import type { ProviderMessage } from "../providers/ProviderTypes.js";
import type { PromptSet } from "./Prompts.js";

export type AgentRole = "planner" | "executor";

export interface RoleProfile {
  role: AgentRole;
  systemPrompt: string;
  /** Planner turns are sent without tools; executor turns get the whole registry. */
  usesTools: boolean;
}

export const roleProfile = (role: AgentRole, prompts: PromptSet): RoleProfile => {
  switch (role) {
    case "planner":
      return { role, systemPrompt: prompts.planner, usesTools: false };
    case "executor":
      return { role, systemPrompt: prompts.executor, usesTools: true };
  }
};

export const systemMessage = (profile: RoleProfile): ProviderMessage => ({
  role: "system",
  content: profile.systemPrompt,
});
