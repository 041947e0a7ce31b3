import type { DomBuilder } from "../dom-builder/types";
import { sanitizeString } from "../util/string-helper";
import { BaseTransferInformation } from "./base-transfer-information";

/**
 * A single credit transfer (CdtTrfTxInf): we pay the named creditor.
 */
export class CustomerCreditTransferInformation extends BaseTransferInformation {
  readonly kind = "credit-transfer" as const;

  protected purposeCode: string | null = null;
  protected ultimateCreditorName: string | null = null;

  accept(domBuilder: DomBuilder): void {
    domBuilder.visitCreditTransfer(this);
  }

  getPurposeCode(): string | null {
    return this.purposeCode;
  }

  setPurposeCode(purposeCode: string): void {
    this.purposeCode = purposeCode.toUpperCase();
  }

  getUltimateCreditorName(): string | null {
    return this.ultimateCreditorName;
  }

  setUltimateCreditorName(name: string): void {
    this.ultimateCreditorName = sanitizeString(name);
  }
}
