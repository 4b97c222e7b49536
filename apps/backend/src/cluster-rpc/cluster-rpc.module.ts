import { HttpModule } from "@nestjs/axios";
import { Module } from "@nestjs/common";
import { ClusterRpcService } from "./cluster-rpc.service.js";
import { HttpRpcClient } from "./http-rpc.client.js";
import { RPC_CLIENT } from "./types.js";

@Module({
  imports: [HttpModule],
  providers: [HttpRpcClient, { provide: RPC_CLIENT, useExisting: HttpRpcClient }, ClusterRpcService],
  exports: [ClusterRpcService, RPC_CLIENT],
})
export class ClusterRpcModule {}
