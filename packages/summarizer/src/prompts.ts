export const TOPIC_SCHEMA = JSON.stringify({
  type: "array",
  items: {
    type: "object",
    properties: {
      topicName: { type: "string", description: "Short title of the topic discussed." },
      sinceId: { type: "number", description: "Id of the message the topic starts from." },
      participants: { type: "array", items: { type: "string" } },
      discussion: {
        type: "array",
        minItems: 1,
        maxItems: 5,
        items: {
          type: "object",
          properties: {
            point: { type: "string" },
            keyIds: { type: "array", items: { type: "number" } }
          },
          required: ["point", "keyIds"]
        }
      },
      conclusion: { type: "string", description: "Optional conclusion of the topic." }
    },
    required: ["topicName", "sinceId", "participants", "discussion"]
  }
});

export const SUMMARIZATION_SYSTEM_PROMPT = [
  "You summarize chat histories into refined outlines.",
  "Identify 1-20 distinct discussion topics, focusing on key points and keeping the essence of the conversation.",
  `Reply with JSON only, matching this JSON Schema: ${TOPIC_SCHEMA}`
].join("\n");

export function buildSummarizationPrompt(history: string, language: string): string {
  return [
    `Analyze the following chat history and summarize it in ${language}.`,
    "",
    'Chat history:"""',
    history,
    '"""',
    "",
    "Topics may be discussed in parallel, so look for related keywords across the whole history."
  ].join("\n");
}

export const CONDENSE_SYSTEM_PROMPT = [
  "You condense chat histories into a single sharp sentence.",
  "Use one or two fitting emoji.",
  "Reply with the sentence only, without any preface or explanation."
].join("\n");

export function buildCondensePrompt(history: string, language: string): string {
  return [`Condense this chat history into one sentence in ${language}:`, '"""', history, '"""'].join("\n");
}
