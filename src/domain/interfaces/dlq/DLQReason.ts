export type DLQReason = "max_retries" | "closed";
