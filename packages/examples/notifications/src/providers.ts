import {
  asFactory,
  asLazyClass,
  asValue,
  defineProviders,
  lifecycle,
} from "graphwire/runtime";
import {
  Clock,
  Escalation,
  OnCallRotation,
  SenderAddress,
  SmsGatewayUrl,
} from "./tokens";

/**
 * Default configuration for the notifications module. Hosts apply their own
 * blocks after this one to replace any of these bindings.
 */
export default defineProviders({
  values: [
    asValue(SenderAddress, "alerts@example.com"),
    asValue(SmsGatewayUrl, "https://sms.example.com/v1"),
    asValue(OnCallRotation, "platform-primary"),
  ],
  factories: [
    asFactory(Clock, () => () => new Date(), {
      lifecycle: lifecycle.singleton(),
    }),
  ],
  lazyServices: [
    asLazyClass(
      Escalation,
      () => import("./pager").then((m) => m.OnCallPager),
      {
        lifecycle: lifecycle.singleton(),
        deps: [OnCallRotation],
        retry: { retries: 2, backoffMs: 25 },
      },
    ),
  ],
});
