// Gemini: implementation of TextCompletion over the generateContent REST API.

import {
  HttpClient,
  type HttpClientError,
  HttpClientRequest,
} from "@effect/platform";
import { Config, Effect, Layer, Option, Redacted, Schema } from "effect";
import { CompletionError, TextCompletion } from "../text-completion.ts";

// --- Gemini response schema ---

const GeminiResponse = Schema.Struct({
  candidates: Schema.optional(
    Schema.Array(
      Schema.Struct({
        content: Schema.optional(
          Schema.Struct({
            parts: Schema.optional(
              Schema.Array(Schema.Struct({ text: Schema.optional(Schema.String) })),
            ),
          }),
        ),
        finishReason: Schema.optional(Schema.String),
      }),
    ),
  ),
  promptFeedback: Schema.optional(
    Schema.Struct({ blockReason: Schema.optional(Schema.String) }),
  ),
});

type GeminiResponseType = typeof GeminiResponse.Type;

// --- Decode Gemini response into text ---

export function decodeGeminiResponse(
  json: unknown,
): Effect.Effect<string, CompletionError> {
  return Schema.decodeUnknown(GeminiResponse)(json).pipe(
    Effect.mapError(
      (e) => new CompletionError({ message: `Invalid response: ${e.message}` }),
    ),
    Effect.flatMap(interpretGeminiResponse),
  );
}

function interpretGeminiResponse(
  response: GeminiResponseType,
): Effect.Effect<string, CompletionError> {
  const blockReason = response.promptFeedback?.blockReason;
  if (blockReason !== undefined) {
    return Effect.fail(
      new CompletionError({ message: `Prompt blocked: ${blockReason}` }),
    );
  }

  const parts = response.candidates?.[0]?.content?.parts ?? [];
  const text = parts.map((p) => p.text ?? "").join("");

  return text.trim().length === 0
    ? Effect.fail(new CompletionError({ message: "Empty response" }))
    : Effect.succeed(text);
}

export function fromHttpClientError(
  e: HttpClientError.HttpClientError,
): CompletionError {
  if (e._tag === "RequestError") {
    return new CompletionError({ message: `Network error: ${e.message}` });
  }
  return new CompletionError({
    message: e.reason === "StatusCode"
      ? `HTTP ${e.response.status}`
      : `Unreadable response: ${e.message}`,
  });
}

// --- Gemini layer ---

export const GeminiLive = Layer.effect(
  TextCompletion,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
    );
    const apiKey = yield* Config.option(Config.redacted("GEMINI_API_KEY"));
    const model = yield* Config.string("GEMINI_MODEL").pipe(
      Config.withDefault("gemini-2.5-pro"),
    );
    const baseUrl = yield* Config.string("GEMINI_BASE_URL").pipe(
      Config.withDefault("https://generativelanguage.googleapis.com/v1beta"),
    );

    if (Option.isNone(apiKey)) {
      yield* Effect.logDebug("[gemini] GEMINI_API_KEY not set");
    }

    return TextCompletion.of({
      complete: (prompt: string) =>
        Option.match(apiKey, {
          onNone: () =>
            Effect.fail(
              new CompletionError({ message: "GEMINI_API_KEY is not configured" }),
            ),
          onSome: (key) =>
            client.execute(
              HttpClientRequest.post(
                `${baseUrl}/models/${encodeURIComponent(model)}:generateContent`,
              ).pipe(
                HttpClientRequest.setHeader("x-goog-api-key", Redacted.value(key)),
                HttpClientRequest.bodyUnsafeJson({
                  contents: [{ role: "user", parts: [{ text: prompt }] }],
                }),
              ),
            ).pipe(
              Effect.flatMap((response) => response.json),
              Effect.mapError(fromHttpClientError),
              Effect.flatMap(decodeGeminiResponse),
            ),
        }),
    });
  }),
);
