import * as Joi from 'joi';
import { MessagesRequest } from './interfaces/messages.interfaces';

const contentBlockSchema = Joi.object({
  type: Joi.string()
    .valid('text', 'thinking', 'redacted_thinking', 'tool_use', 'tool_result', 'image')
    .required(),
  text: Joi.string().allow('').when('type', {
    is: 'text',
    then: Joi.required(),
  }),
  thinking: Joi.string().allow('').when('type', {
    is: 'thinking',
    then: Joi.required(),
  }),
});

export const messagesRequestSchema = Joi.object<MessagesRequest>({
  model: Joi.string().required(),
  messages: Joi.array()
    .items(
      Joi.object({
        role: Joi.string().valid('user', 'assistant').required(),
        content: Joi.alternatives()
          .try(Joi.string().allow(''), Joi.array().items(contentBlockSchema))
          .required(),
      }),
    )
    .required(),
  max_tokens: Joi.number().integer().min(1).required(),
  system: Joi.alternatives().try(
    Joi.string().allow(''),
    Joi.array().items(
      Joi.object({ type: Joi.string().valid('text').required(), text: Joi.string().allow('').required() }),
    ),
  ),
  stream: Joi.boolean(),
  temperature: Joi.number(),
  top_p: Joi.number(),
  tools: Joi.array().items(
    Joi.object({
      name: Joi.string().required(),
      description: Joi.string().allow(''),
      input_schema: Joi.object(),
    }),
  ),
  thinking: Joi.object({
    type: Joi.string().valid('enabled', 'disabled').required(),
    budget_tokens: Joi.number().integer().min(0),
  }),
}).required();
