import { z } from 'zod';

export const Token = z.object({
  index: z.number().int(),
  word: z.string(),
  originalText: z.string().optional(),
  lemma: z.string().optional(),
  characterOffsetBegin: z.number().int().optional(),
  characterOffsetEnd: z.number().int().optional(),
  pos: z.string().optional(),
  ner: z.string().optional(),
});

export const Dependency = z.object({
  dep: z.string(),
  governor: z.number().int(),
  governorGloss: z.string(),
  dependent: z.number().int(),
  dependentGloss: z.string(),
});

export const EntityMention = z.object({
  text: z.string(),
  ner: z.string(),
  tokenBegin: z.number().int().optional(),
  tokenEnd: z.number().int().optional(),
});

export const Sentence = z.object({
  index: z.number().int(),
  tokens: z.array(Token),
  parse: z.string().optional(),
  basicDependencies: z.array(Dependency).optional(),
  entitymentions: z.array(EntityMention).optional(),
});

export const AnnotatedDocument = z.object({
  sentences: z.array(Sentence),
});

export type TokenT = z.infer<typeof Token>;
export type SentenceT = z.infer<typeof Sentence>;
export type AnnotatedDocumentT = z.infer<typeof AnnotatedDocument>;
