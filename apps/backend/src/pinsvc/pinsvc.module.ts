import { Module } from "@nestjs/common";
import { ClusterRpcModule } from "../cluster-rpc/cluster-rpc.module.js";
import { BatchStatusService } from "./batch-status.service.js";
import { PinsController } from "./pins.controller.js";
import { PinsService } from "./pins.service.js";

@Module({
  imports: [ClusterRpcModule],
  controllers: [PinsController],
  providers: [BatchStatusService, PinsService],
  exports: [PinsService],
})
export class PinsvcModule {}
