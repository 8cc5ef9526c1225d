// src/domain/client-intake/catalog.ts
import type { BillingPeriod } from "../../types.js";
import type { PackageOption } from "./types.js";

export const CUSTOM_PACKAGE = "🛠️ PACOTE PERSONALIZADO";
export const CUSTOM_PRICE = "💰 OUTRO VALOR";
export const CUSTOM_DUE_DATE = "📅 OUTRA DATA";
export const CUSTOM_SERVER = "🛠️ OUTRO SERVIDOR";
export const SKIP_NOTES = "⏭️ PULAR";

export const PACKAGE_CATALOG: PackageOption[] = [
  { label: "📅 MENSAL", period: "monthly" },
  { label: "📅 TRIMESTRAL", period: "quarterly" },
  { label: "📅 SEMESTRAL", period: "semiannual" },
  { label: "📅 ANUAL", period: "yearly" }
];

export const PRICE_CATALOG: string[] = ["30", "35", "40", "45", "50", "60", "70", "90", "135"];

export const SERVER_CATALOG: string[] = [
  "⚡ FAST PLAY",
  "🔥 GOLD PLAY",
  "💎 PREMIUM PLAY",
  "🚀 TURBO TV",
  "📺 MAX TV",
  "🌐 GLOBAL PLAY",
  "⭐ STAR PLAY",
  "🎬 CINE PLAY"
];

export function packagesCatalog(): string[] {
  return [...PACKAGE_CATALOG.map((x) => x.label), CUSTOM_PACKAGE];
}

export function pricesCatalog(): string[] {
  return [...PRICE_CATALOG, CUSTOM_PRICE];
}

export function serversCatalog(): string[] {
  return [...SERVER_CATALOG, CUSTOM_SERVER];
}

// Custom packages bill monthly unless they name one of the catalog labels.
export function billingPeriodFor(pkg: string): BillingPeriod {
  return PACKAGE_CATALOG.find((x) => x.label === pkg)?.period ?? "monthly";
}
