import { XMLParser } from "fast-xml-parser";
import type { DomBuilder } from "../dom-builder/types";
import type { GroupHeader } from "../group-header";
import type { PaymentInformation } from "../payment-information";
import type { CustomerCreditTransferInformation } from "../transfer-information/customer-credit-transfer-information";
import type { CustomerDirectDebitTransferInformation } from "../transfer-information/customer-direct-debit-transfer-information";

/**
 * Visitor that only records the order of visits
 */
export class RecordingDomBuilder implements DomBuilder {
  readonly calls: string[] = [];

  visitTransferFile(): void {
    this.calls.push("file");
  }

  visitGroupHeader(groupHeader: GroupHeader): void {
    this.calls.push(`header:${groupHeader.getMessageIdentification()}`);
  }

  visitPaymentInformation(paymentInformation: PaymentInformation): void {
    this.calls.push(`payment:${paymentInformation.getId()}`);
  }

  visitCreditTransfer(transfer: CustomerCreditTransferInformation): void {
    this.calls.push(`credit:${transfer.getEndToEndIdentification()}`);
  }

  visitDirectDebit(transfer: CustomerDirectDebitTransferInformation): void {
    this.calls.push(`debit:${transfer.getEndToEndIdentification()}`);
  }

  asXml(): string {
    return this.calls.join("\n");
  }
}

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  isArray: (name) => ["PmtInf", "CdtTrfTxInf", "DrctDbtTxInf", "AdrLine"].includes(name),
});

export function parseXml(xml: string): unknown {
  return xmlParser.parse(xml);
}

/**
 * Walk a parsed document along a dotted path, e.g. "PmtInf.0.NbOfTxs"
 */
export function at(node: unknown, path: string): unknown {
  let current = node;
  for (const key of path.split(".")) {
    if (current === null || typeof current !== "object") return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}
