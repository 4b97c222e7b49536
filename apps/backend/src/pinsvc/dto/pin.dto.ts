import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
  ArrayMaxSize,
  buildMessage,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateBy,
  type ValidationOptions,
} from "class-validator";
import { MAX_PIN_NAME_LENGTH, type Pin } from "../types.js";

export const MAX_PIN_ORIGINS = 20;

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((entry) => typeof entry === "string");
}

export function IsStringRecord(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: "isStringRecord",
      validator: {
        validate: (value: unknown) => isStringRecord(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be an object with string values`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

export class PinBodyDto {
  @ApiProperty({
    description: "Content identifier to pin",
    example: "bafkreidivzimqfqtoqxkrpge6bjyhlvxqs3rhe73owtmdulaxr5do5in7u",
  })
  @IsString()
  @IsNotEmpty()
  cid!: string;

  @ApiPropertyOptional({ description: "Optional name for the pinned data", maxLength: MAX_PIN_NAME_LENGTH })
  @IsOptional()
  @IsString()
  @MaxLength(MAX_PIN_NAME_LENGTH)
  name?: string;

  @ApiPropertyOptional({
    description: "Multiaddrs of peers known to provide the data",
    type: [String],
    example: ["/ip4/203.0.113.10/tcp/4001/p2p/12D3KooWExamplePeer"],
  })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(MAX_PIN_ORIGINS)
  @IsString({ each: true })
  origins?: string[];

  @ApiPropertyOptional({
    description: "Free-form string metadata attached to the pin",
    type: "object",
    additionalProperties: { type: "string" },
    example: { app_id: "docs" },
  })
  @IsOptional()
  @IsStringRecord()
  meta?: Record<string, string>;
}

export function toPin(body: PinBodyDto): Pin {
  return {
    cid: body.cid,
    name: body.name ?? "",
    origins: body.origins ?? [],
    meta: body.meta ?? {},
  };
}
