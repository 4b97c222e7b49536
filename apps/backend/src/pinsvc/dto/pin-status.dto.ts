import { ApiProperty } from "@nestjs/swagger";
import { type ExternalPinStatus, type ListResult, PinStatus } from "../types.js";

export class PinDto {
  @ApiProperty({ description: "Content identifier" })
  cid!: string;

  @ApiProperty({ description: "Pin name; empty when none was given" })
  name!: string;

  @ApiProperty({ description: "Provider multiaddrs given when the pin was added", type: [String] })
  origins!: string[];

  @ApiProperty({ type: "object", additionalProperties: { type: "string" } })
  meta!: Record<string, string>;
}

export class PinStatusDto {
  @ApiProperty({ description: "Request identifier; the CID of the pin" })
  requestid!: string;

  @ApiProperty({ enum: PinStatus })
  status!: PinStatus;

  @ApiProperty({ description: "Earliest status report (ISO-8601)", example: "2024-05-01T10:00:00.000Z" })
  created!: string;

  @ApiProperty({ type: PinDto })
  pin!: PinDto;

  @ApiProperty({ description: "Multiaddrs of peers that will hold the data", type: [String] })
  delegates!: string[];

  @ApiProperty({ type: "object", additionalProperties: { type: "string" } })
  info!: Record<string, string>;
}

export class PinResultsDto {
  @ApiProperty({ description: "Number of results in this response" })
  count!: number;

  @ApiProperty({ type: [PinStatusDto] })
  results!: PinStatusDto[];
}

export function toPinStatusDto(status: ExternalPinStatus): PinStatusDto {
  return {
    requestid: status.requestId,
    status: status.status,
    created: status.created.toISOString(),
    pin: {
      cid: status.pin.cid,
      name: status.pin.name,
      origins: status.pin.origins,
      meta: status.pin.meta,
    },
    delegates: status.delegates,
    info: status.info,
  };
}

export function toPinResultsDto(list: ListResult): PinResultsDto {
  return {
    count: list.count,
    results: list.results.map(toPinStatusDto),
  };
}
