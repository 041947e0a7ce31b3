import type { DomBuilder } from "../dom-builder/types";
import { InvalidArgumentError } from "../errors";
import { sanitizeString } from "../util/string-helper";

export type TransferKind = "credit-transfer" | "direct-debit";

/**
 * Fields shared by every single transaction inside a PmtInf block.
 * The counterparty is the creditor for a credit transfer and the debtor
 * for a direct debit.
 */
export abstract class BaseTransferInformation {
  abstract readonly kind: TransferKind;

  /** Amount in cents */
  protected readonly transferAmount: number;
  protected iban: string;
  protected bic: string | null = null;
  protected name: string;
  protected currency = "EUR";
  protected endToEndIdentification: string;
  protected instructionId: string | null = null;
  protected remittanceInformation: string | null = null;
  protected creditorReference: string | null = null;
  protected creditorReferenceType = "SCOR";
  protected country: string | null = null;
  protected postalAddress: string[] = [];

  constructor(amountCents: number, iban: string, name: string, endToEndIdentification?: string) {
    if (!Number.isSafeInteger(amountCents) || amountCents < 0) {
      throw new InvalidArgumentError(
        `Transfer amount must be a non-negative integer number of cents, got ${amountCents}`,
        "amount"
      );
    }
    this.transferAmount = amountCents;
    this.iban = iban.replace(/\s/g, "");
    this.name = sanitizeString(name);
    this.endToEndIdentification = endToEndIdentification
      ? sanitizeString(endToEndIdentification)
      : "NOTPROVIDED";
  }

  abstract accept(domBuilder: DomBuilder): void;

  getTransferAmount(): number {
    return this.transferAmount;
  }

  getIban(): string {
    return this.iban;
  }

  getBic(): string | null {
    return this.bic;
  }

  setBic(bic: string): void {
    this.bic = bic.replace(/\s/g, "").toUpperCase();
  }

  getName(): string {
    return this.name;
  }

  getCurrency(): string {
    return this.currency;
  }

  setCurrency(currency: string): void {
    this.currency = currency.toUpperCase();
  }

  getEndToEndIdentification(): string {
    return this.endToEndIdentification;
  }

  getInstructionId(): string | null {
    return this.instructionId;
  }

  setInstructionId(instructionId: string): void {
    this.instructionId = sanitizeString(instructionId);
  }

  getRemittanceInformation(): string | null {
    return this.remittanceInformation;
  }

  setRemittanceInformation(remittanceInformation: string): void {
    this.remittanceInformation = sanitizeString(remittanceInformation);
  }

  getCreditorReference(): string | null {
    return this.creditorReference;
  }

  /**
   * Structured creditor reference (ISO 11649 "RF..." by default).
   * Takes precedence over unstructured remittance information in the output.
   */
  setCreditorReference(reference: string, type = "SCOR"): void {
    this.creditorReference = sanitizeString(reference);
    this.creditorReferenceType = type.toUpperCase();
  }

  getCreditorReferenceType(): string {
    return this.creditorReferenceType;
  }

  getCountry(): string | null {
    return this.country;
  }

  setCountry(country: string): void {
    this.country = country.toUpperCase();
  }

  getPostalAddress(): readonly string[] {
    return this.postalAddress;
  }

  /** Up to two unstructured address lines (AdrLine) */
  setPostalAddress(lines: string[]): void {
    this.postalAddress = lines.map(sanitizeString).filter((line) => line.length > 0).slice(0, 2);
  }
}
