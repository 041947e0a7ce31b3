import { sepaLogger } from "@/lib/logger";
import type { DomBuilder } from "../dom-builder/types";
import { InvalidTransferFileConfigurationError } from "../errors";
import type { GroupHeader } from "../group-header";
import type { PaymentInformation } from "../payment-information";
import type { TransferInformation } from "../transfer-information";

// InstdAmt must be at least 0.01
const MINIMUM_AMOUNT_CENTS = 1;

/**
 * A complete payment file: one group header plus one or more PmtInf blocks.
 */
export abstract class BaseTransferFile<T extends TransferInformation = TransferInformation> {
  /** Payment method every block of this file type must carry */
  protected abstract readonly paymentMethod: string;

  protected groupHeader: GroupHeader;
  protected paymentInformations: PaymentInformation<T>[] = [];

  constructor(groupHeader: GroupHeader) {
    this.groupHeader = groupHeader;
  }

  protected abstract createDomBuilder(): DomBuilder;

  getGroupHeader(): GroupHeader {
    return this.groupHeader;
  }

  getPaymentInformations(): readonly PaymentInformation<T>[] {
    return [...this.paymentInformations];
  }

  /**
   * Scope the block to this file's payment method and take ownership of it
   */
  addPaymentInformation(paymentInformation: PaymentInformation<T>): void {
    paymentInformation.setValidPaymentMethods([this.paymentMethod]);
    paymentInformation.setPaymentMethod(this.paymentMethod);
    this.paymentInformations.push(paymentInformation);
    this.refreshGroupHeaderTotals();
  }

  /**
   * @throws InvalidTransferFileConfigurationError
   */
  validate(): void {
    if (this.paymentInformations.length === 0) {
      throw new InvalidTransferFileConfigurationError("No Payment Information available");
    }
    for (const paymentInformation of this.paymentInformations) {
      if (paymentInformation.getNumberOfTransactions() === 0) {
        throw new InvalidTransferFileConfigurationError(
          `Payment Information ${paymentInformation.getId()} has no transactions`
        );
      }
      for (const transfer of paymentInformation.getTransfers()) {
        if (transfer.getTransferAmount() < MINIMUM_AMOUNT_CENTS) {
          throw new InvalidTransferFileConfigurationError(
            `Transfer ${transfer.getEndToEndIdentification()} in ${paymentInformation.getId()} has an amount below 0.01`
          );
        }
      }
    }
    this.refreshGroupHeaderTotals();
  }

  accept(domBuilder: DomBuilder): void {
    this.refreshGroupHeaderTotals();
    domBuilder.visitTransferFile(this);
    this.groupHeader.accept(domBuilder);
    for (const paymentInformation of this.paymentInformations) {
      paymentInformation.accept(domBuilder);
    }
  }

  asXml(): string {
    this.validate();
    const domBuilder = this.createDomBuilder();
    this.accept(domBuilder);
    const xml = domBuilder.asXml();

    sepaLogger.debug(
      {
        messageId: this.groupHeader.getMessageIdentification(),
        paymentInformations: this.paymentInformations.length,
        transactions: this.groupHeader.getNumberOfTransactions(),
        controlSumCents: this.groupHeader.getControlSumCents(),
      },
      "SEPA file generated"
    );

    return xml;
  }

  protected refreshGroupHeaderTotals(): void {
    let transactions = 0;
    let controlSumCents = 0;
    for (const paymentInformation of this.paymentInformations) {
      transactions += paymentInformation.getNumberOfTransactions();
      controlSumCents += paymentInformation.getControlSumCents();
    }
    this.groupHeader.setTotals(transactions, controlSumCents);
  }
}
