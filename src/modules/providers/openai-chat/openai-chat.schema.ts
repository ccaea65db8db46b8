import * as Joi from 'joi';
import { ChatCompletionRequest } from './interfaces/chat.interfaces';

const contentPartSchema = Joi.object({
  type: Joi.string().required(),
  text: Joi.string().allow(''),
});

export const chatCompletionRequestSchema = Joi.object<ChatCompletionRequest>({
  model: Joi.string().required(),
  messages: Joi.array()
    .items(
      Joi.object({
        role: Joi.string().required(),
        content: Joi.alternatives()
          .try(Joi.string().allow(''), Joi.array().items(contentPartSchema))
          .allow(null),
      }),
    )
    .required(),
  stream: Joi.boolean(),
  stream_options: Joi.object({ include_usage: Joi.boolean() }).allow(null),
  max_tokens: Joi.number().integer().min(0).allow(null),
  max_completion_tokens: Joi.number().integer().min(0).allow(null),
  temperature: Joi.number().allow(null),
  top_p: Joi.number().allow(null),
  tools: Joi.array().items(
    Joi.object({
      type: Joi.string().valid('function').required(),
      function: Joi.object({
        name: Joi.string().required(),
        description: Joi.string().allow(''),
        parameters: Joi.object(),
      }).required(),
    }),
  ),
  tool_choice: Joi.any(),
}).required();
