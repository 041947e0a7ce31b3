/**
 * SEPA payment files (ISO 20022 pain.001 / pain.008)
 */

// Types & errors
export * from "./types";
export * from "./errors";
export { getSepaConfig, resetSepaConfig } from "./config";
export type { SepaConfig } from "./config";

// Model
export { PaymentInformation } from "./payment-information";
export { GroupHeader } from "./group-header";
export * from "./transfer-information";
export { BaseTransferFile } from "./transfer-file/base-transfer-file";
export { CustomerCreditTransferFile } from "./transfer-file/customer-credit-transfer-file";
export { CustomerDirectDebitTransferFile } from "./transfer-file/customer-direct-debit-transfer-file";

// DOM builders
export type { DomBuilder } from "./dom-builder/types";
export { BaseDomBuilder } from "./dom-builder/base-dom-builder";
export type { XmlElement, XmlValue } from "./dom-builder/base-dom-builder";
export { CustomerCreditTransferDomBuilder } from "./dom-builder/customer-credit-transfer-dom-builder";
export { CustomerDirectDebitTransferDomBuilder } from "./dom-builder/customer-direct-debit-transfer-dom-builder";

// Utilities
export { sanitizeString } from "./util/string-helper";
export { parseAmountToCents, intToCurrency } from "./util/amount";

// Facade
export * from "./facade";
