/**
 * Shared plumbing for the pain.001 / pain.008 DOM builders.
 *
 * Visits build a plain element tree; asXml() serializes it with
 * fast-xml-parser. Element key order is document order.
 */

import { XMLBuilder } from "fast-xml-parser";
import { InvalidTransferFileConfigurationError } from "../errors";
import type { GroupHeader } from "../group-header";
import type { PaymentInformation } from "../payment-information";
import type { BaseTransferFile } from "../transfer-file/base-transfer-file";
import type { BaseTransferInformation } from "../transfer-information/base-transfer-information";
import type { CustomerCreditTransferInformation } from "../transfer-information/customer-credit-transfer-information";
import type { CustomerDirectDebitTransferInformation } from "../transfer-information/customer-direct-debit-transfer-information";
import type { SchemaName } from "../types";
import { intToCurrency } from "../util/amount";
import type { DomBuilder } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export type XmlValue = string | string[] | XmlElement | XmlElement[];

export interface XmlElement {
  [name: string]: XmlValue;
}

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const XSI_NAMESPACE = "http://www.w3.org/2001/XMLSchema-instance";

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  format: true,
  indentBy: "  ",
});

// ============================================================================
// BASE BUILDER
// ============================================================================

export abstract class BaseDomBuilder implements DomBuilder {
  /** e.g. "pain.001.001.03" */
  protected readonly painFormat: string;
  /** Initiation element below Document, e.g. "CstmrCdtTrfInitn" */
  protected readonly initiationElementName: string;

  protected groupHeader: XmlElement | null = null;
  protected paymentInformations: XmlElement[] = [];
  protected currentPaymentInformation: PaymentInformation | null = null;
  protected currentTransactions: XmlElement[] | null = null;

  constructor(painFormat: string, initiationElementName: string) {
    this.painFormat = painFormat;
    this.initiationElementName = initiationElementName;
  }

  abstract visitPaymentInformation(paymentInformation: PaymentInformation): void;
  abstract visitCreditTransfer(transfer: CustomerCreditTransferInformation): void;
  abstract visitDirectDebit(transfer: CustomerDirectDebitTransferInformation): void;

  /**
   * Start a fresh document
   */
  visitTransferFile(_transferFile: BaseTransferFile): void {
    this.groupHeader = null;
    this.paymentInformations = [];
    this.currentPaymentInformation = null;
    this.currentTransactions = null;
  }

  visitGroupHeader(groupHeader: GroupHeader): void {
    const initiatingParty: XmlElement = { Nm: groupHeader.getInitiatingPartyName() };
    const initiatingPartyId = groupHeader.getInitiatingPartyId();
    if (initiatingPartyId) {
      const other: XmlElement = { Id: initiatingPartyId };
      const issuer = groupHeader.getIssuer();
      if (issuer) other.Issr = issuer;
      initiatingParty.Id = { OrgId: { Othr: other } };
    }

    this.groupHeader = {
      MsgId: groupHeader.getMessageIdentification(),
      CreDtTm: this.formatDateTime(groupHeader.getCreationDateTime()),
      NbOfTxs: String(groupHeader.getNumberOfTransactions()),
      CtrlSum: this.intToCurrency(groupHeader.getControlSumCents()),
      InitgPty: initiatingParty,
    };
  }

  asXml(): string {
    const initiation: XmlElement = {};
    if (this.groupHeader) initiation.GrpHdr = this.groupHeader;
    if (this.paymentInformations.length > 0) initiation.PmtInf = this.paymentInformations;

    const document: XmlElement = {
      Document: {
        "@_xmlns": `urn:iso:std:iso:20022:tech:xsd:${this.painFormat}`,
        "@_xmlns:xsi": XSI_NAMESPACE,
        "@_xsi:schemaLocation": `urn:iso:std:iso:20022:tech:xsd:${this.painFormat} ${this.painFormat}.xsd`,
        [this.initiationElementName]: initiation,
      },
    };

    return `${XML_DECLARATION}\n${xmlBuilder.build(document)}`;
  }

  // ==========================================================================
  // PAYMENT BLOCK BOOKKEEPING
  // ==========================================================================

  /**
   * Register a rendered PmtInf element; following transfers are appended
   * to its transaction list.
   */
  protected openPaymentInformation(
    paymentInformation: PaymentInformation,
    element: XmlElement,
    transactionElementName: string
  ): void {
    const transactions: XmlElement[] = [];
    element[transactionElementName] = transactions;
    this.paymentInformations.push(element);
    this.currentPaymentInformation = paymentInformation;
    this.currentTransactions = transactions;
  }

  protected appendTransaction(element: XmlElement): void {
    if (!this.currentTransactions) {
      throw new InvalidTransferFileConfigurationError(
        "Transfer visited before any payment information block"
      );
    }
    this.currentTransactions.push(element);
  }

  // ==========================================================================
  // ELEMENT HELPERS
  // ==========================================================================

  /**
   * Integer cents → "1234.56"
   */
  protected intToCurrency(cents: number): string {
    return intToCurrency(cents);
  }

  protected formatDateTime(date: Date): string {
    // ISO 8601 in UTC without milliseconds
    return date.toISOString().replace(/\.\d{3}Z$/, "Z");
  }

  protected createAmountElement(cents: number, currency: string): XmlElement {
    return { "@_Ccy": currency, "#text": this.intToCurrency(cents) };
  }

  /**
   * Account identification (the content of an Id element)
   */
  protected createAccountIdElement(accountId: string, schemaName: SchemaName = "IBAN"): XmlElement {
    if (schemaName === "BBAN") {
      return { Othr: { Id: accountId, SchmeNm: { Cd: "BBAN" } } };
    }
    return { IBAN: accountId };
  }

  /**
   * Agent element content; without a BIC the agent is NOTPROVIDED
   */
  protected createFinancialInstitutionElement(bic: string | null): XmlElement {
    if (bic) {
      return { FinInstnId: { BIC: bic } };
    }
    return { FinInstnId: { Othr: { Id: "NOTPROVIDED" } } };
  }

  protected createPostalAddressElement(
    country: string | null,
    addressLines: readonly string[]
  ): XmlElement | null {
    if (!country && addressLines.length === 0) return null;
    const address: XmlElement = {};
    if (country) address.Ctry = country;
    if (addressLines.length > 0) address.AdrLine = [...addressLines];
    return address;
  }

  /**
   * Structured creditor reference wins over unstructured remittance text
   */
  protected createRemittanceElement(transfer: BaseTransferInformation): XmlElement | null {
    const reference = transfer.getCreditorReference();
    if (reference) {
      return {
        Strd: {
          CdtrRefInf: {
            Tp: { CdOrPrtry: { Cd: transfer.getCreditorReferenceType() } },
            Ref: reference,
          },
        },
      };
    }

    const remittance = transfer.getRemittanceInformation();
    if (remittance) {
      return { Ustrd: remittance.slice(0, 140) };
    }
    return null;
  }

  protected createPaymentIdElement(transfer: BaseTransferInformation): XmlElement {
    const paymentId: XmlElement = {};
    const instructionId = transfer.getInstructionId();
    if (instructionId) paymentId.InstrId = instructionId;
    paymentId.EndToEndId = transfer.getEndToEndIdentification().slice(0, 35);
    return paymentId;
  }

  protected createOrganisationIdElement(id: string, scheme: string | null): XmlElement {
    const other: XmlElement = { Id: id };
    if (scheme) other.SchmeNm = { Cd: scheme };
    return { OrgId: { Othr: other } };
  }
}
