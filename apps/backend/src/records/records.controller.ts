import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  ForbiddenException,
  Headers,
  HttpCode,
  NotFoundException,
  Param,
  Post,
  Put,
  Req,
} from "@nestjs/common";
import type { Request } from "express";
import type {
  FieldInput,
  ValidationResult,
} from "../dns/validation/record-validation.types";
import { RecordManagerService } from "./record-manager.service";
import type {
  AddRecordOutcome,
  EditRecordOutcome,
  RecordActor,
  RecordInput,
} from "./records.types";

export interface RecordRequestBody {
  name?: unknown;
  type?: unknown;
  content?: unknown;
  ttl?: unknown;
  prio?: unknown;
  comment?: unknown;
}

function toFieldInput(value: unknown, field: string): FieldInput {
  if (
    value === undefined ||
    value === null ||
    typeof value === "number" ||
    typeof value === "string"
  ) {
    return value;
  }
  throw new BadRequestException(`${field} must be a number or a string`);
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new BadRequestException(`${field} is required`);
  }
  return value;
}

function parseRecordBody(body: RecordRequestBody | undefined): RecordInput {
  const payload = body ?? {};
  if (payload.comment !== undefined && typeof payload.comment !== "string") {
    throw new BadRequestException("comment must be a string");
  }

  return {
    name: requireString(payload.name, "name").trim(),
    type: requireString(payload.type, "type").trim(),
    content: requireString(payload.content, "content").trim(),
    ttl: toFieldInput(payload.ttl, "ttl"),
    prio: toFieldInput(payload.prio, "prio"),
    comment: payload.comment,
  };
}

function resolveActor(request: Request, remoteUser?: string): RecordActor {
  return {
    author: remoteUser?.trim() || "anonymous",
    clientAddress: request.ip ?? request.socket.remoteAddress ?? "unknown",
  };
}

function rejectFailedOutcome(
  outcome: Exclude<
    AddRecordOutcome | EditRecordOutcome,
    { status: "created" } | { status: "updated" }
  >,
  notFoundMessage: string,
): never {
  switch (outcome.status) {
    case "invalid":
      throw new BadRequestException({
        message: "Record validation failed",
        errors: outcome.errors,
      });
    case "read-only":
      throw new ForbiddenException(
        `Zone "${outcome.zoneName}" is a secondary zone and cannot be modified.`,
      );
    case "not-found":
      throw new NotFoundException(notFoundMessage);
    case "failed":
      throw new BadGatewayException(
        "The PowerDNS API rejected the record change.",
      );
  }
}

@Controller()
export class RecordsController {
  constructor(private readonly recordManager: RecordManagerService) {}

  @Post("zones/:zoneId/records")
  async addRecord(
    @Param("zoneId") zoneId: string,
    @Body() body: RecordRequestBody,
    @Req() request: Request,
    @Headers("x-remote-user") remoteUser?: string,
  ): Promise<{ created: true }> {
    const outcome = await this.recordManager.addRecord(
      zoneId,
      parseRecordBody(body),
      resolveActor(request, remoteUser),
    );
    if (outcome.status !== "created") {
      rejectFailedOutcome(outcome, `Zone "${zoneId}" not found.`);
    }
    return { created: true };
  }

  @Put("records/:recordId")
  async editRecord(
    @Param("recordId") recordId: string,
    @Body() body: RecordRequestBody,
    @Req() request: Request,
    @Headers("x-remote-user") remoteUser?: string,
  ): Promise<{ updated: true; recordId: string }> {
    const outcome = await this.recordManager.editRecord(
      recordId,
      parseRecordBody(body),
      resolveActor(request, remoteUser),
    );
    if (outcome.status !== "updated") {
      rejectFailedOutcome(outcome, `Record "${recordId}" not found.`);
    }
    return { updated: true, recordId: outcome.record.id };
  }

  @Post("zones/:zoneId/records/validate")
  @HttpCode(200)
  async validateRecord(
    @Param("zoneId") zoneId: string,
    @Body() body: RecordRequestBody,
  ): Promise<ValidationResult> {
    const result = await this.recordManager.validateRecord(
      zoneId,
      parseRecordBody(body),
    );
    if (!result) {
      throw new NotFoundException(`Zone "${zoneId}" not found.`);
    }
    return result;
  }
}
