// Text completion: service definition and error.

import { Context, Data, type Effect } from "effect";

export class CompletionError extends Data.TaggedError("CompletionError")<{
  readonly message: string;
}> {}

export class TextCompletion extends Context.Tag("TextCompletion")<
  TextCompletion,
  {
    readonly complete: (
      prompt: string,
    ) => Effect.Effect<string, CompletionError>;
  }
>() {}
