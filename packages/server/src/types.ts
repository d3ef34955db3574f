import type { ChatAgent } from "parley";

export interface AppEnv {
  Variables: {
    requestId: string;
    /** Set by the auth middleware on `/chat/*` */
    userId: string;
  };
}

/** The part of the agent the transport drives. */
export type TurnRunner = Pick<ChatAgent, "process">;
