export const DeliveryGuarantee = {
  AtLeastOnce: "at_least_once",
  ExactlyOnce: "exactly_once",
  AtMostOnceWithRetry: "at_most_once_with_retry",
} as const;

export type DeliveryGuarantee =
  (typeof DeliveryGuarantee)[keyof typeof DeliveryGuarantee];
