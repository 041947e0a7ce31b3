import type { CustomerCreditTransferInformation } from "./customer-credit-transfer-information";
import type { CustomerDirectDebitTransferInformation } from "./customer-direct-debit-transfer-information";

export { BaseTransferInformation } from "./base-transfer-information";
export type { TransferKind } from "./base-transfer-information";
export { CustomerCreditTransferInformation } from "./customer-credit-transfer-information";
export { CustomerDirectDebitTransferInformation } from "./customer-direct-debit-transfer-information";

export type TransferInformation =
  | CustomerCreditTransferInformation
  | CustomerDirectDebitTransferInformation;
