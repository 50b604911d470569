import { z } from 'zod';

// Every field degrades to "absent" instead of failing the whole response.
const optionalString = z.string().nullish().catch(undefined);
const optionalNumber = z.number().nullish().catch(undefined);

export const labelSchema = z.object({
  id: optionalString,
  name: optionalString,
  type: optionalString,
  messagesTotal: optionalNumber,
  messagesUnread: optionalNumber,
  threadsTotal: optionalNumber,
  threadsUnread: optionalNumber,
});

// Entries that are not label objects are dropped; the rest survive
export const labelListSchema = z
  .object({
    labels: z
      .array(z.unknown())
      .catch([])
      .transform(items =>
        items.flatMap(item => {
          const label = labelSchema.safeParse(item);
          return label.success ? [label.data] : [];
        })
      ),
  })
  .catch({ labels: [] });

export const profileSchema = z
  .object({
    emailAddress: optionalString,
    messagesTotal: optionalNumber,
    threadsTotal: optionalNumber,
    historyId: optionalString,
  })
  .catch({});

export const messageListSchema = z
  .object({ messages: z.array(z.object({ id: optionalString }).catch({})).catch([]) })
  .catch({ messages: [] });

const headerSchema = z.object({ name: optionalString, value: optionalString }).catch({});

export type RawPart = {
  mimeType?: string | null;
  body?: { data?: string | null };
  headers?: Array<{ name?: string | null; value?: string | null }>;
  parts?: RawPart[];
};

export const partSchema: z.ZodType<RawPart, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      mimeType: optionalString,
      body: z.object({ data: optionalString }).optional().catch(undefined),
      headers: z.array(headerSchema).catch([]),
      parts: z.array(partSchema).optional().catch(undefined),
    })
    .catch({ headers: [] })
);

export const rawMessageSchema = z
  .object({
    id: z.string().catch(''),
    threadId: z.string().catch(''),
    internalDate: z
      .union([z.string(), z.number()])
      .transform(String)
      .nullish()
      .catch(undefined),
    labelIds: z
      .array(z.unknown())
      .catch([])
      .transform(ids => ids.filter((id): id is string => typeof id === 'string')),
    payload: partSchema.optional().catch(undefined),
  })
  .catch({ id: '', threadId: '', labelIds: [] });

export type RawMessage = z.infer<typeof rawMessageSchema>;
