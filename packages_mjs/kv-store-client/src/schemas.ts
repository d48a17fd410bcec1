import { z } from 'zod';
import { SecretPayload, SecretValue } from './types.js';

export const SecretValueSchema: z.ZodType<SecretValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number().finite(),
        z.boolean(),
        z.null(),
        z.array(SecretValueSchema),
        z.record(SecretValueSchema)
    ])
);

export const SecretPayloadSchema: z.ZodType<SecretPayload> = z.record(SecretValueSchema);

export const ListResponseSchema = z.object({
    data: z.object({
        keys: z.array(z.string())
    })
});

export const SecretResponseSchema = z.object({
    data: z.object({
        data: SecretPayloadSchema.nullable(),
        metadata: z.object({
            version: z.number().int()
        }).partial().nullish()
    })
});

export function formatIssues(error: z.ZodError): string {
    return error.errors.map(e => `${e.path.join('.') || '<root>'}: ${e.message}`).join(', ');
}
