import { BaseHandler } from "../BaseHandler";
import { retentionSweepRequestSchema } from "../../shared/requests/RetentionSweepRequest";
import type { RetentionSweepRequest } from "../../shared/requests/RetentionSweepRequest";
import type { RetentionSweepResponse } from "../../shared/responses/RetentionSweepResponse";
import type { RetentionSweepUseCase } from "./RetentionSweepUseCase";

export class RetentionSweepHandler extends BaseHandler<RetentionSweepRequest, RetentionSweepResponse> {
  constructor(private readonly useCase: RetentionSweepUseCase) {
    super();
  }

  async execute(request: unknown): Promise<RetentionSweepResponse> {
    const sweepRequest = this.validateRequest(request, retentionSweepRequestSchema, "Retention sweep");
    return this.useCase.execute(sweepRequest);
  }
}
