import type { z } from "zod";
import { InputValidationError } from "../shared/errors/InputValidationError";

/**
 * Base class for business-layer handlers: validate the raw request with zod,
 * then delegate to a use case.
 */
export abstract class BaseHandler<RequestType, ResponseType> {
  /**
   * @param operationName - Used as the prefix of the validation error message
   * @throws InputValidationError listing every failing path
   */
  protected validateRequest<T extends RequestType>(
    request: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    operationName: string,
  ): T {
    const result = schema.safeParse(request);

    if (!result.success) {
      const errors = result.error.errors
        .map((err) => (err.path.length > 0 ? `${err.path.join(".")}: ${err.message}` : err.message))
        .join("\n");
      throw new InputValidationError(`${operationName} request validation failed:\n${errors}`);
    }

    return result.data;
  }

  abstract execute(request: unknown): Promise<ResponseType>;
}
