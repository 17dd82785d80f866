import * as Sentry from "@sentry/node"

// SENTRY_DSN is read by the SDK itself; without it nothing is sent
Sentry.init({
  environment: process.env.SENTRY_ENVIRONMENT ?? process.env.NODE_ENV,
  tracesSampleRate: process.env.SENTRY_TRACES_SAMPLE_RATE
    ? parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE)
    : 0.15,
  initialScope: {
    tags: { service: "bustime-sensors" },
  },
})
