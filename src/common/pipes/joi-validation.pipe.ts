import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { ObjectSchema } from 'joi';

/**
 * Validate a request body against a Joi schema. Unknown fields pass through
 * untouched; a violation becomes a 400 with an OpenAI-style error body.
 */
@Injectable()
export class JoiValidationPipe<T> implements PipeTransform<unknown, T> {
    constructor(private readonly schema: ObjectSchema<T>) { }

    transform(value: unknown): T {
        const result = this.schema.validate(value, {
            abortEarly: true,
            allowUnknown: true,
        });

        if (result.error !== undefined) {
            throw new BadRequestException({
                error: {
                    message: result.error.message,
                    type: 'invalid_request_error',
                    param: null,
                    code: 'invalid_request',
                },
            });
        }

        return result.value;
    }
}
