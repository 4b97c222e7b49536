import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Query,
  Res,
  UsePipes,
  ValidationPipe,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ApiBody, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from "@nestjs/swagger";
import type { Response } from "express";
import type { CID } from "multiformats/cid";
import { toStructuredError } from "../common/logging.js";
import type { IConfig, IPinsvcConfig } from "../config/app.config.js";
import { PinBodyDto, toPin } from "./dto/pin.dto.js";
import { PinResultsDto, PinStatusDto, toPinResultsDto, toPinStatusDto } from "./dto/pin-status.dto.js";
import { toHttpException, validationExceptionFactory } from "./http-errors.js";
import { parseCid, parseListOptions } from "./list-options.js";
import { PinsService } from "./pins.service.js";
import { MatchingStrategy } from "./types.js";

/**
 * Signal that fires when the client goes away before the response is written.
 * `close` also fires after a normal response; `writableFinished` tells the two apart.
 */
function clientDisconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.once("close", () => {
    if (!res.writableFinished) {
      controller.abort(new Error("client disconnected"));
    }
  });
  return controller.signal;
}

const bodyValidation = new ValidationPipe({
  transform: true,
  forbidUnknownValues: true,
  exceptionFactory: validationExceptionFactory,
});

@ApiTags("Pins")
@Controller("pins")
export class PinsController {
  private readonly logger = new Logger(PinsController.name);
  private readonly pinsvcConfig: IPinsvcConfig;

  constructor(
    private readonly pinsService: PinsService,
    private readonly configService: ConfigService<IConfig, true>,
  ) {
    this.pinsvcConfig = this.configService.get<IPinsvcConfig>("pinsvc");
  }

  @Get()
  @ApiOperation({ summary: "List pin objects" })
  @ApiQuery({ name: "cid", required: false, description: "Comma-separated CIDs to look up" })
  @ApiQuery({ name: "name", required: false, description: "Pin name filter (at most 255 characters)" })
  @ApiQuery({ name: "match", required: false, enum: MatchingStrategy, description: "How `name` is compared" })
  @ApiQuery({ name: "status", required: false, description: "Comma-separated statuses; defaults to pinned" })
  @ApiQuery({ name: "before", required: false, description: "Only pins created before this ISO-8601 time" })
  @ApiQuery({ name: "after", required: false, description: "Only pins created after this ISO-8601 time" })
  @ApiQuery({ name: "limit", required: false, description: "Maximum number of results (1-1000, default 10)" })
  @ApiQuery({ name: "meta", required: false, description: "JSON object of metadata entries to match" })
  @ApiResponse({ status: 200, type: PinResultsDto })
  @ApiResponse({ status: 400, description: "Malformed query" })
  @ApiResponse({ status: 500, description: "Cluster failure, or a failed lookup of one of the requested CIDs" })
  async listPins(
    @Query() query: Record<string, unknown>,
    @Res({ passthrough: true }) res: Response,
  ): Promise<PinResultsDto> {
    try {
      const options = parseListOptions(query, this.pinsvcConfig.maxCids);
      const list = await this.pinsService.listPins(options, clientDisconnectSignal(res));
      if (list.error) {
        throw list.error;
      }
      return toPinResultsDto(list);
    } catch (error) {
      throw this.fail("GET /pins", error);
    }
  }

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @UsePipes(bodyValidation)
  @ApiOperation({ summary: "Add a pin" })
  @ApiBody({ type: PinBodyDto })
  @ApiResponse({ status: 202, type: PinStatusDto })
  @ApiResponse({ status: 400, description: "Malformed body or CID" })
  async addPin(@Body() body: PinBodyDto, @Res({ passthrough: true }) res: Response): Promise<PinStatusDto> {
    this.logger.log(`POST /pins cid=${body.cid}`);
    try {
      const status = await this.pinsService.addPin(toPin(body), undefined, clientDisconnectSignal(res));
      return toPinStatusDto(status);
    } catch (error) {
      throw this.fail("POST /pins", error);
    }
  }

  @Get(":requestid")
  @ApiOperation({ summary: "Get a pin's status" })
  @ApiParam({ name: "requestid", description: "Request identifier (the pin's CID)" })
  @ApiResponse({ status: 200, type: PinStatusDto })
  @ApiResponse({ status: 400, description: "Malformed request identifier" })
  @ApiResponse({ status: 404, description: "Pin not found" })
  async getPin(
    @Param("requestid") requestId: string,
    @Res({ passthrough: true }) res: Response,
  ): Promise<PinStatusDto> {
    try {
      const status = await this.pinsService.getPin(this.requestCid(requestId), clientDisconnectSignal(res));
      return toPinStatusDto(status);
    } catch (error) {
      throw this.fail("GET /pins/:requestid", error);
    }
  }

  @Post(":requestid")
  @HttpCode(HttpStatus.ACCEPTED)
  @UsePipes(bodyValidation)
  @ApiOperation({ summary: "Replace a pin", description: "Pins the body's CID, taking over the placement of `requestid`." })
  @ApiParam({ name: "requestid", description: "Request identifier of the pin being replaced" })
  @ApiBody({ type: PinBodyDto })
  @ApiResponse({ status: 202, type: PinStatusDto })
  @ApiResponse({ status: 400, description: "Malformed body or request identifier" })
  async replacePin(
    @Param("requestid") requestId: string,
    @Body() body: PinBodyDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<PinStatusDto> {
    this.logger.log(`POST /pins/${requestId} cid=${body.cid}`);
    try {
      const replaces = this.requestCid(requestId);
      const status = await this.pinsService.addPin(toPin(body), replaces, clientDisconnectSignal(res));
      return toPinStatusDto(status);
    } catch (error) {
      throw this.fail("POST /pins/:requestid", error);
    }
  }

  @Delete(":requestid")
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: "Remove a pin" })
  @ApiParam({ name: "requestid", description: "Request identifier (the pin's CID)" })
  @ApiResponse({ status: 202, description: "Removal accepted" })
  @ApiResponse({ status: 400, description: "Malformed request identifier" })
  @ApiResponse({ status: 404, description: "Pin not found" })
  async removePin(@Param("requestid") requestId: string, @Res({ passthrough: true }) res: Response): Promise<void> {
    this.logger.log(`DELETE /pins/${requestId}`);
    try {
      await this.pinsService.removePin(this.requestCid(requestId), clientDisconnectSignal(res));
    } catch (error) {
      throw this.fail("DELETE /pins/:requestid", error);
    }
  }

  private requestCid(requestId: string): CID {
    return parseCid(requestId, "requestid");
  }

  private fail(route: string, error: unknown) {
    const exception = toHttpException(error);
    if (exception.getStatus() >= 500) {
      this.logger.error({
        event: "pin_request_failed",
        message: `${route} failed`,
        route,
        error: toStructuredError(error),
      });
    }
    return exception;
  }
}
