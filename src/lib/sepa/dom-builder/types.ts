import type { GroupHeader } from "../group-header";
import type { PaymentInformation } from "../payment-information";
import type { BaseTransferFile } from "../transfer-file/base-transfer-file";
import type { CustomerCreditTransferInformation } from "../transfer-information/customer-credit-transfer-information";
import type { CustomerDirectDebitTransferInformation } from "../transfer-information/customer-direct-debit-transfer-information";

/**
 * Visitor over the closed set of things that end up in a payment file.
 * Each visitable kind calls exactly one of these methods on itself.
 */
export interface DomBuilder {
  visitTransferFile(transferFile: BaseTransferFile): void;
  visitGroupHeader(groupHeader: GroupHeader): void;
  visitPaymentInformation(paymentInformation: PaymentInformation): void;
  visitCreditTransfer(transfer: CustomerCreditTransferInformation): void;
  visitDirectDebit(transfer: CustomerDirectDebitTransferInformation): void;
  asXml(): string;
}
