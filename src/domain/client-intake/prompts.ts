// src/domain/client-intake/prompts.ts
import { SKIP_NOTES } from "./catalog.js";
import type { CatalogStepId, ClientDraft, DialogStep, DraftField, Prompt, StoredClient } from "./types.js";

export const STEP_FIELD: Record<Exclude<DialogStep["id"], "COMPLETE">, DraftField> = {
  AWAIT_NAME: "name",
  AWAIT_PHONE: "phone",
  AWAIT_PACKAGE: "package",
  AWAIT_PRICE: "price",
  AWAIT_DUE_DATE: "dueDate",
  AWAIT_SERVER: "server",
  AWAIT_NOTES: "notes"
};

const FIELD_LABEL: Record<DraftField, string> = {
  name: "📝 Nome",
  phone: "📱 Telefone",
  package: "📦 Pacote",
  price: "💰 Valor",
  dueDate: "📅 Vencimento",
  server: "🖥️ Servidor",
  notes: "🗒️ Observações"
};

const SELECT_TEXT: Record<CatalogStepId, string> = {
  AWAIT_PACKAGE: "Passo 3/7: escolha o *pacote* do cliente.",
  AWAIT_PRICE: "Passo 4/7: escolha o *valor mensal* (R$).",
  AWAIT_DUE_DATE: "Passo 5/7: escolha a *data de vencimento*.",
  AWAIT_SERVER: "Passo 6/7: escolha o *servidor*."
};

const CUSTOM_TEXT: Record<CatalogStepId, string> = {
  AWAIT_PACKAGE: "✏️ Digite o nome do pacote personalizado.\n\nExemplos: Plano Família, Combo Streaming",
  AWAIT_PRICE: "✏️ Digite o valor personalizado.\n\nExemplos: 25,90 ou 149",
  AWAIT_DUE_DATE: "✏️ Digite a data de vencimento.\n\nFormato: DD/MM/AAAA",
  AWAIT_SERVER: "✏️ Digite o nome do servidor."
};

export function promptFor(step: DialogStep): Prompt {
  switch (step.id) {
    case "AWAIT_NAME":
      return {
        text: "📝 *Cadastro de novo cliente*\n\nPasso 1/7: digite o *nome completo* do cliente.\nPara desistir a qualquer momento, envie /cancelar.",
        options: null
      };
    case "AWAIT_PHONE":
      return { text: "Passo 2/7: digite o *telefone* do cliente.\n\nExemplo: 11999999999", options: null };
    case "AWAIT_NOTES":
      return {
        text: "Passo 7/7: digite as *observações* do cliente ou toque em PULAR.",
        options: [SKIP_NOTES]
      };
    case "COMPLETE":
      return { text: "⏳ Salvando o cadastro...", options: null };
    default:
      if (step.mode === "custom") return { text: CUSTOM_TEXT[step.id], options: null };
      return { text: SELECT_TEXT[step.id], options: [...step.options] };
  }
}

export function acceptedNotice(field: DraftField, value: string): string {
  return `✅ ${FIELD_LABEL[field]}: ${value || "(sem observações)"}`;
}

export function rejectedNotice(step: DialogStep): string {
  if ("mode" in step && step.mode === "selecting") return "❌ Opção inválida. Escolha uma das opções abaixo.";
  return "❌ Resposta vazia. Digite um valor.";
}

export function draftSummary(draft: ClientDraft): string {
  const fields: DraftField[] = ["name", "phone", "package", "price", "dueDate", "server", "notes"];
  return fields.map((f) => `${FIELD_LABEL[f]}: ${draft[f] || "-"}`).join("\n");
}

export function savedPrompt(record: StoredClient): Prompt {
  return {
    text: ["✅ *CLIENTE CADASTRADO COM SUCESSO!*", "", draftSummary(record), "", "Envie qualquer mensagem para um novo cadastro."].join("\n"),
    options: null
  };
}

export function saveFailedPrompt(): Prompt {
  return {
    text: "❌ Não foi possível salvar o cliente. Os dados foram mantidos; envie qualquer mensagem para tentar novamente.",
    options: null
  };
}

export function cancelledPrompt(): Prompt {
  return { text: "❌ Cadastro cancelado. Envie qualquer mensagem para começar de novo.", options: null };
}
