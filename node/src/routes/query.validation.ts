import { z } from 'zod';

/**
 * Request body for POST /api/query.
 * `branch` / `location` override the filters derived from the question.
 */
export const queryRequestSchema = z.object({
  question: z.string().trim().min(1, 'question is required and cannot be empty').max(2000),
  branch: z.string().trim().min(1).optional(),
  location: z.string().trim().min(1).optional(),
  topK: z.number().int().min(1).max(50).optional(),
});

export type QueryRequestBody = z.infer<typeof queryRequestSchema>;

export function validateQueryRequest(data: unknown):
  | { success: true; data: QueryRequestBody }
  | { success: false; error: Array<{ path: string; message: string }> } {
  const result = queryRequestSchema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return { success: true, data: result.data };
}
