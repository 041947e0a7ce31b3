import type { z } from "zod";
import { sepaLogger } from "@/lib/logger";
import { getSepaConfig } from "../config";
import { InvalidArgumentError } from "../errors";
import type { PaymentInformation } from "../payment-information";
import type { BaseTransferFile } from "../transfer-file/base-transfer-file";
import type { BaseTransferInformation } from "../transfer-information/base-transfer-information";
import type { TransferInformation } from "../transfer-information";

type PaymentInfoCommon = {
  dueDate?: Date;
  batchBooking?: boolean;
  serviceLevel?: string;
  localInstrumentCode?: string;
  categoryPurposeCode?: string;
  country?: string;
  bankPartyIdentification?: string;
  bankPartyIdentificationScheme?: string;
  hideOriginAccountIBAN?: boolean;
  hideGeneralSettings?: boolean;
};

type TransferCommon = {
  currency?: string;
  instructionId?: string;
  remittanceInformation?: string;
  creditorReference?: string;
  country?: string;
  postalAddress?: string[];
};

/**
 * Name-keyed wrapper around a transfer file: payment blocks are registered
 * under a name, transfers are added by that name.
 */
export abstract class BaseCustomerFacade<T extends TransferInformation> {
  protected readonly transferFile: BaseTransferFile<T>;
  protected readonly payments = new Map<string, PaymentInformation<T>>();

  constructor(transferFile: BaseTransferFile<T>) {
    this.transferFile = transferFile;
  }

  getTransferFile(): BaseTransferFile<T> {
    return this.transferFile;
  }

  getPaymentInformation(name: string): PaymentInformation<T> {
    const paymentInformation = this.payments.get(name);
    if (!paymentInformation) {
      throw new InvalidArgumentError(`Payment with the name ${name} does not exist`, "paymentName");
    }
    return paymentInformation;
  }

  asXml(): string {
    return this.transferFile.asXml();
  }

  protected registerPayment(name: string, paymentInformation: PaymentInformation<T>): void {
    if (this.payments.has(name)) {
      throw new InvalidArgumentError(`Payment with the name ${name} already exists`, "paymentName");
    }
    this.transferFile.addPaymentInformation(paymentInformation);
    this.payments.set(name, paymentInformation);
  }

  /**
   * Validate facade input, turning zod issues into an InvalidArgumentError
   */
  protected parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, context: string): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
      const issues = result.error.issues;
      const fields = issues.map((issue) => issue.path.join(".") || "(root)");
      sepaLogger.warn({ context, fields }, "Rejected SEPA input");
      throw new InvalidArgumentError(
        `Invalid ${context}: ${issues.map((issue, i) => `${fields[i]}: ${issue.message}`).join("; ")}`,
        fields[0]
      );
    }
    return result.data;
  }

  protected applyPaymentSettings(paymentInformation: PaymentInformation<T>, input: PaymentInfoCommon): void {
    const config = getSepaConfig();

    paymentInformation.setDueDateFormat(config.dueDateFormat);
    if (input.dueDate) paymentInformation.setDueDate(input.dueDate);

    const batchBooking = input.batchBooking ?? config.batchBooking;
    if (batchBooking !== null) paymentInformation.setBatchBooking(batchBooking);

    if (input.serviceLevel) paymentInformation.setServiceLevel(input.serviceLevel);
    if (input.localInstrumentCode) paymentInformation.setLocalInstrumentCode(input.localInstrumentCode);
    if (input.categoryPurposeCode) paymentInformation.setCategoryPurposeCode(input.categoryPurposeCode);
    if (input.country) paymentInformation.setCountry(input.country.toUpperCase());
    if (input.bankPartyIdentification) {
      paymentInformation.setOriginBankPartyIdentification(input.bankPartyIdentification);
    }
    if (input.bankPartyIdentificationScheme) {
      paymentInformation.setOriginBankPartyIdentificationScheme(input.bankPartyIdentificationScheme);
    }
    if (input.hideOriginAccountIBAN) paymentInformation.hideOriginAccountIBAN();
    if (input.hideGeneralSettings) paymentInformation.hideGeneralSettings();
  }

  protected applyTransferSettings(transfer: BaseTransferInformation, input: TransferCommon): void {
    transfer.setCurrency(input.currency ?? getSepaConfig().defaultCurrency);
    if (input.instructionId) transfer.setInstructionId(input.instructionId);
    if (input.remittanceInformation) transfer.setRemittanceInformation(input.remittanceInformation);
    if (input.creditorReference) transfer.setCreditorReference(input.creditorReference);
    if (input.country) transfer.setCountry(input.country);
    if (input.postalAddress) transfer.setPostalAddress(input.postalAddress);
  }
}
