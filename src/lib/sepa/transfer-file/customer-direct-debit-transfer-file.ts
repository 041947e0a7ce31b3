import { CustomerDirectDebitTransferDomBuilder } from "../dom-builder/customer-direct-debit-transfer-dom-builder";
import type { DomBuilder } from "../dom-builder/types";
import { InvalidTransferFileConfigurationError } from "../errors";
import type { CustomerDirectDebitTransferInformation } from "../transfer-information/customer-direct-debit-transfer-information";
import { PAYMENT_METHOD_DIRECT_DEBIT } from "../types";
import { BaseTransferFile } from "./base-transfer-file";

export class CustomerDirectDebitTransferFile extends BaseTransferFile<CustomerDirectDebitTransferInformation> {
  protected readonly paymentMethod = PAYMENT_METHOD_DIRECT_DEBIT;

  protected createDomBuilder(): DomBuilder {
    return new CustomerDirectDebitTransferDomBuilder();
  }

  /**
   * Direct debits additionally need a creditor scheme id, a sequence type
   * and a signed mandate for every transaction.
   */
  validate(): void {
    super.validate();

    for (const paymentInformation of this.paymentInformations) {
      const id = paymentInformation.getId();
      if (!paymentInformation.getCreditorId()) {
        throw new InvalidTransferFileConfigurationError(`Payment Information ${id} has no CreditorId`);
      }
      if (!paymentInformation.getSequenceType()) {
        throw new InvalidTransferFileConfigurationError(`Payment Information ${id} has no SequenceType`);
      }

      for (const transfer of paymentInformation.getTransfers()) {
        if (!transfer.getMandateId()) {
          throw new InvalidTransferFileConfigurationError(
            `Transfer ${transfer.getEndToEndIdentification()} in ${id} has no mandate id`
          );
        }
        if (!transfer.getMandateSignDate() && !paymentInformation.getMandateSignDate()) {
          throw new InvalidTransferFileConfigurationError(
            `Transfer ${transfer.getEndToEndIdentification()} in ${id} has no mandate sign date`
          );
        }
      }
    }
  }
}
