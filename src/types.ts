// src/types.ts
export type BillingPeriod = "monthly" | "quarterly" | "semiannual" | "yearly";

export type DueDateOffsets = Record<BillingPeriod, number[]>;

export interface AgentConfig {
  token: string;
  phoneNumberId: string;
  graphVersion: string;
  baseUrl: string;
  webhookVerifyToken?: string;
  webhookPort: number;
  webhookPath: string;
  timezone: string;
  sessionIdleMinutes: number;
  dueDateOffsets: DueDateOffsets;
}
