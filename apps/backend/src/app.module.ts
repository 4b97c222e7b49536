import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { AppController } from "./app.controller.js";
import { ClusterRpcModule } from "./cluster-rpc/cluster-rpc.module.js";
import { configValidationSchema, loadConfig } from "./config/app.config.js";
import { MetricsPrometheusModule } from "./metrics-prometheus/metrics-prometheus.module.js";
import { PinsvcModule } from "./pinsvc/pinsvc.module.js";

@Module({
  imports: [
    ConfigModule.forRoot({
      load: [loadConfig],
      validationSchema: configValidationSchema,
      isGlobal: true,
    }),
    MetricsPrometheusModule,
    ClusterRpcModule,
    PinsvcModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
