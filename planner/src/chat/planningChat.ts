import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { AIMessage, HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { Logger } from "pino";

import { InvalidInputError, ProviderUnavailableError, errorMessage } from "../errors.js";
import type { ConversationStore } from "../memory/conversationStore.js";
import { normalizeUserId } from "../memory/conversationStore.js";
import { buildContext } from "../rag/context.js";
import type { ContextBundle, CrossProjectLinker } from "../rag/crossProject.js";

export type PlanningStep = 2 | 3;

export const STEP_COMMANDS: Record<PlanningStep, string> = {
  2: "[STEP2로 이동]",
  3: "[STEP3로 이동]"
};

export const SUMMARY_COMMAND = "[정리]";

export type ChatReply = {
  response: string;
  context: ContextBundle | null;
};

function replyText(content: unknown): string {
  if (typeof content === "string") return content;
  if (Array.isArray(content)) {
    return content
      .map((part: unknown) => {
        if (typeof part === "string") return part;
        if (part !== null && typeof part === "object" && "text" in part && typeof part.text === "string") {
          return part.text;
        }
        return "";
      })
      .join("");
  }
  return String(content);
}

/**
 * One project's Socratic planning conversation: history from the store,
 * optional cross-project context, reply from the chat model, both turns
 * appended back to the store.
 */
export class PlanningChat {
  private readonly store: ConversationStore;
  private readonly linker: CrossProjectLinker;
  private readonly model: BaseChatModel;
  private readonly systemPrompt: string;
  private readonly historyMaxMessages: number;
  private readonly logger: Logger;

  constructor(params: {
    store: ConversationStore;
    linker: CrossProjectLinker;
    model: BaseChatModel;
    systemPrompt: string;
    historyMaxMessages: number;
    logger: Logger;
  }) {
    this.store = params.store;
    this.linker = params.linker;
    this.model = params.model;
    this.systemPrompt = params.systemPrompt;
    this.historyMaxMessages = params.historyMaxMessages;
    this.logger = params.logger.child({ component: "planning-chat" });
  }

  async reply(params: { userId: string; projectId: string; message: string }): Promise<ChatReply> {
    const userId = normalizeUserId(params.userId);
    const message = params.message.trim();
    if (!message) {
      throw new InvalidInputError("Message is required");
    }

    const turns = await this.store.listTurns(userId, params.projectId);
    const history = this.historyMaxMessages > 0 ? turns.slice(-this.historyMaxMessages) : [];
    const context = await this.linker.resolve(userId, params.projectId, message);

    await this.store.appendTurn(userId, params.projectId, "user", message);

    const prompt = context ? `${message}\n\n${buildContext(context)}` : message;
    const result = await this.model
      .invoke([
        new SystemMessage(this.systemPrompt),
        ...history.map((t) => (t.role === "assistant" ? new AIMessage(t.text) : new HumanMessage(t.text))),
        new HumanMessage(prompt)
      ])
      .catch((err: unknown) => {
        throw new ProviderUnavailableError(`Chat model failed: ${errorMessage(err)}`, { cause: err });
      });

    const response = replyText(result.content);
    if (!response.trim()) {
      throw new ProviderUnavailableError("Chat model returned an empty reply");
    }
    await this.store.appendTurn(userId, params.projectId, "assistant", response);

    this.logger.info(
      { userId, projectId: params.projectId, contextItems: context?.items.length ?? null },
      "Generated reply"
    );
    return { response, context };
  }

  nextStep(params: { userId: string; projectId: string; step: PlanningStep }): Promise<ChatReply> {
    return this.reply({ userId: params.userId, projectId: params.projectId, message: STEP_COMMANDS[params.step] });
  }

  summarize(params: { userId: string; projectId: string }): Promise<ChatReply> {
    return this.reply({ ...params, message: SUMMARY_COMMAND });
  }
}
