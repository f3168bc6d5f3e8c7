import {
  ConditionParser,
  ConditionRequest,
  headerValue,
} from "./ConditionParser";

export const X_CLIENT_IP = "x-client-ip";
export const X_REAL_IP = "x-real-ip";
export const X_FORWARDED_FOR = "x-forwarded-for";

const IPV4_MAPPED_PREFIX = "::ffff:";

/**
 * Source IP of the request, e.g. {"inf:SourceIP": "10.0.0.1"}.
 *
 * Proxy headers win over the socket address, in the order
 * x-client-ip, x-real-ip, x-forwarded-for (first hop).
 */
export class SourceIpParser implements ConditionParser {
  parseCondition(request: ConditionRequest): string {
    const forwarded = headerValue(request, X_FORWARDED_FOR)
      ?.split(",")[0]
      .trim();

    const address =
      headerValue(request, X_CLIENT_IP) ||
      headerValue(request, X_REAL_IP) ||
      forwarded ||
      request.socket.remoteAddress ||
      "";

    if (address === "::1") {
      return "127.0.0.1";
    }
    if (
      address.toLowerCase().startsWith(IPV4_MAPPED_PREFIX) &&
      address.includes(".")
    ) {
      return address.slice(IPV4_MAPPED_PREFIX.length);
    }
    return address;
  }
}
