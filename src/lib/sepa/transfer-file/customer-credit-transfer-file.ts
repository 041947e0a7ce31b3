import { CustomerCreditTransferDomBuilder } from "../dom-builder/customer-credit-transfer-dom-builder";
import type { DomBuilder } from "../dom-builder/types";
import type { CustomerCreditTransferInformation } from "../transfer-information/customer-credit-transfer-information";
import { PAYMENT_METHOD_CREDIT_TRANSFER } from "../types";
import { BaseTransferFile } from "./base-transfer-file";

export class CustomerCreditTransferFile extends BaseTransferFile<CustomerCreditTransferInformation> {
  protected readonly paymentMethod = PAYMENT_METHOD_CREDIT_TRANSFER;

  protected createDomBuilder(): DomBuilder {
    return new CustomerCreditTransferDomBuilder();
  }
}
