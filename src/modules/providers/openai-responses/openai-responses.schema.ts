import * as Joi from 'joi';
import { ResponsesRequest } from './interfaces/responses.interfaces';

const inputItemSchema = Joi.object({
  type: Joi.string(),
  role: Joi.string(),
  content: Joi.alternatives().try(
    Joi.string().allow(''),
    Joi.array().items(
      Joi.object({ type: Joi.string().required(), text: Joi.string().allow('') }),
    ),
  ),
  call_id: Joi.string(),
  output: Joi.string().allow(''),
});

export const responsesRequestSchema = Joi.object<ResponsesRequest>({
  model: Joi.string().required(),
  input: Joi.alternatives()
    .try(Joi.string().allow(''), Joi.array().items(inputItemSchema))
    .required(),
  instructions: Joi.string().allow('', null),
  stream: Joi.boolean(),
  max_output_tokens: Joi.number().integer().min(0).allow(null),
  temperature: Joi.number().allow(null),
  top_p: Joi.number().allow(null),
  tools: Joi.array().items(
    Joi.object({
      type: Joi.string().required(),
      name: Joi.string(),
      description: Joi.string().allow(''),
      parameters: Joi.object(),
    }),
  ),
  tool_choice: Joi.any(),
  store: Joi.boolean(),
  reasoning: Joi.object({
    effort: Joi.string().allow(null),
    summary: Joi.string().allow(null),
  }).allow(null),
  text: Joi.object({
    format: Joi.object({ type: Joi.string().required() }),
    verbosity: Joi.string(),
  }).allow(null),
}).required();
