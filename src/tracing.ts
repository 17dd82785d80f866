import { PrometheusExporter } from "@opentelemetry/exporter-prometheus"
import { NodeSDK } from "@opentelemetry/sdk-node"

const otelSDK = new NodeSDK({
  serviceName: "bustime-sensors",
  metricReader: new PrometheusExporter({
    port: parseInt(process.env.METRICS_PORT ?? "9090", 10),
  }),
})

process.on("SIGTERM", () => {
  otelSDK
    .shutdown()
    .then(
      () => console.log("OTel SDK shut down successfully"),
      (err: unknown) => console.log("Error shutting down OTel SDK", err),
    )
    .finally(() => process.exit(0))
})

export default otelSDK
