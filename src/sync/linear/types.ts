import { z } from "zod";

const pageInfoSchema = z.object({
  hasNextPage: z.boolean(),
  endCursor: z.string().nullish(),
});

export const linearIssueSchema = z.object({
  id: z.string().min(1),
  identifier: z.string().nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  dueDate: z.string().nullish(),
  state: z.object({ name: z.string() }).nullish(),
  project: z.object({ name: z.string() }).nullish(),
});

export const linearProjectSchema = z.object({
  id: z.string().min(1),
  name: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  startDate: z.string().nullish(),
  targetDate: z.string().nullish(),
  state: z.string().nullish(),
});

export const issuesPageSchema = z.object({
  issues: z.object({
    nodes: z.array(linearIssueSchema),
    pageInfo: pageInfoSchema,
  }),
});

export const projectsPageSchema = z.object({
  projects: z.object({
    nodes: z.array(linearProjectSchema),
    pageInfo: pageInfoSchema,
  }),
});

export const graphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(z.object({ message: z.string() }).passthrough())
    .optional(),
});

export type LinearIssueResponse = z.infer<typeof linearIssueSchema>;
export type LinearProjectResponse = z.infer<typeof linearProjectSchema>;
