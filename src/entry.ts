import { z } from "zod";

export const EntrySchema = z.object({
  id: z.number().int().positive(),
  item: z.string(),
  completed: z.boolean(),
});

export type Entry = z.infer<typeof EntrySchema>;

// What a client posts. Missing fields take their zero values, and any `id`
// it sends is stripped; the store assigns ids.
export const NewEntrySchema = z.object({
  item: z.string().default(""),
  completed: z.boolean().default(false),
});

export type NewEntry = z.infer<typeof NewEntrySchema>;

// A JSON null is an empty batch.
export const BatchSchema = z
  .array(NewEntrySchema)
  .nullable()
  .transform(batch => batch ?? []);

export const CollectionSchema = z.array(EntrySchema).superRefine((entries, ctx) => {
  const seen = new Set<number>();
  entries.forEach((e, i) => {
    if (seen.has(e.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "id"], message: `duplicate id ${e.id}` });
    }
    seen.add(e.id);
  });
});

function parseJSON(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}

export type Decoded<T> = { ok: true; value: T } | { ok: false; error: string };

function decodeWith<S extends z.ZodTypeAny>(schema: S, text: string): Decoded<z.output<S>> {
  const json = parseJSON(text);
  if (!json.ok) return json;
  const res = schema.safeParse(json.value);
  if (!res.success) {
    const issue = res.error.issues[0];
    return { ok: false, error: `${issue.path.join(".") || "(root)"}: ${issue.message}` };
  }
  return { ok: true, value: res.data };
}

export function decodeBatch(text: string): Decoded<NewEntry[]> {
  return decodeWith(BatchSchema, text);
}

export function decodeCollection(text: string): Decoded<Entry[]> {
  return decodeWith(CollectionSchema, text);
}

export function encodeCollection(entries: readonly Entry[]): string {
  return JSON.stringify(entries, null, 2);
}
