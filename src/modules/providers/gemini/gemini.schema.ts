import * as Joi from 'joi';
import { GenerateContentRequest } from './interfaces/gemini.interfaces';

const contentSchema = Joi.object({
  role: Joi.string(),
  parts: Joi.array()
    .items(
      Joi.object({
        text: Joi.string().allow(''),
        thought: Joi.boolean(),
        functionCall: Joi.object({ name: Joi.string().required() }),
        functionResponse: Joi.object({ name: Joi.string().required() }),
      }),
    )
    .required(),
});

export const generateContentRequestSchema = Joi.object<GenerateContentRequest>({
  contents: Joi.array().items(contentSchema).required(),
  systemInstruction: contentSchema,
  generationConfig: Joi.object({
    maxOutputTokens: Joi.number().integer().min(0),
    temperature: Joi.number(),
    topP: Joi.number(),
    stopSequences: Joi.array().items(Joi.string()),
    thinkingConfig: Joi.object({
      thinkingBudget: Joi.number().integer(),
      includeThoughts: Joi.boolean(),
    }),
  }),
  tools: Joi.array().items(
    Joi.object({
      functionDeclarations: Joi.array().items(
        Joi.object({
          name: Joi.string().required(),
          description: Joi.string().allow(''),
          parameters: Joi.object(),
        }),
      ),
    }),
  ),
  toolConfig: Joi.any(),
}).required();
