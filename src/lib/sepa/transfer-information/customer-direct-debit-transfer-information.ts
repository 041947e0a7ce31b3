import { isValid } from "date-fns";
import type { DomBuilder } from "../dom-builder/types";
import { InvalidArgumentError } from "../errors";
import { sanitizeString } from "../util/string-helper";
import { BaseTransferInformation } from "./base-transfer-information";

/**
 * A single direct debit (DrctDbtTxInf): we collect from the named debtor
 * under a signed mandate.
 */
export class CustomerDirectDebitTransferInformation extends BaseTransferInformation {
  readonly kind = "direct-debit" as const;

  protected mandateId: string | null = null;
  protected mandateSignDate: Date | null = null;

  // Mandate amendment details (AmdmntInfDtls)
  protected originalMandateId: string | null = null;
  protected originalDebtorIban: string | null = null;
  protected amendedDebtorAccount = false;

  accept(domBuilder: DomBuilder): void {
    domBuilder.visitDirectDebit(this);
  }

  getMandateId(): string | null {
    return this.mandateId;
  }

  setMandateId(mandateId: string): void {
    this.mandateId = sanitizeString(mandateId);
  }

  getMandateSignDate(): Date | null {
    return this.mandateSignDate;
  }

  setMandateSignDate(mandateSignDate: Date): void {
    if (!isValid(mandateSignDate)) {
      throw new InvalidArgumentError("Invalid mandate sign date", "mandateSignDate");
    }
    this.mandateSignDate = mandateSignDate;
  }

  getOriginalMandateId(): string | null {
    return this.originalMandateId;
  }

  setOriginalMandateId(originalMandateId: string): void {
    this.originalMandateId = sanitizeString(originalMandateId);
  }

  getOriginalDebtorIban(): string | null {
    return this.originalDebtorIban;
  }

  setOriginalDebtorIban(iban: string): void {
    this.originalDebtorIban = iban.replace(/\s/g, "");
  }

  /** The debtor moved the mandate to an account at another bank (SMNDA) */
  setAmendedDebtorAccount(): void {
    this.amendedDebtorAccount = true;
  }

  hasAmendedDebtorAccount(): boolean {
    return this.amendedDebtorAccount;
  }

  hasAmendments(): boolean {
    return (
      this.originalMandateId !== null ||
      this.originalDebtorIban !== null ||
      this.amendedDebtorAccount
    );
  }
}
