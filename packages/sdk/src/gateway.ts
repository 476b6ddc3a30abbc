/**
 * Bridges the core AnnotationGateway onto the platform client.
 */

import type { AnnotationRequest } from "@slo-annotator/types";
import type { AnnotationGateway } from "@slo-annotator/core";
import { SubmissionFailure } from "@slo-annotator/core";
import type { SloPlatformClient } from "./client.js";
import { PlatformError } from "./types.js";

export class PlatformAnnotationGateway implements AnnotationGateway {
  constructor(private readonly client: SloPlatformClient) {}

  async createAnnotation(request: AnnotationRequest, signal: AbortSignal): Promise<void> {
    try {
      await this.client.annotations.create(
        {
          name: request.id,
          slo: request.sloIdentity.name,
          project: request.sloIdentity.project,
          description: request.description,
          startTime: request.startTime,
          endTime: request.endTime,
        },
        signal,
      );
    } catch (error) {
      if (error instanceof PlatformError) {
        const reason = error.code === "TIMEOUT" ? "timeout" : error.message;
        throw new SubmissionFailure(request.sloIdentity, reason, error.code);
      }
      throw error;
    }
  }
}
