import type { DomBuilder } from "./dom-builder/types";
import { sanitizeString } from "./util/string-helper";

/**
 * File-level header (GrpHdr). Totals are filled in by the owning transfer file.
 */
export class GroupHeader {
  protected messageIdentification: string;
  protected initiatingPartyName: string;
  protected initiatingPartyId: string | null = null;
  protected issuer: string | null = null;
  protected creationDateTime: Date;
  protected numberOfTransactions = 0;
  protected controlSumCents = 0;

  constructor(messageIdentification: string, initiatingPartyName: string) {
    this.messageIdentification = messageIdentification;
    this.initiatingPartyName = sanitizeString(initiatingPartyName);
    this.creationDateTime = new Date();
  }

  accept(domBuilder: DomBuilder): void {
    domBuilder.visitGroupHeader(this);
  }

  getMessageIdentification(): string {
    return this.messageIdentification;
  }

  getInitiatingPartyName(): string {
    return this.initiatingPartyName;
  }

  setInitiatingPartyName(name: string): void {
    this.initiatingPartyName = sanitizeString(name);
  }

  getInitiatingPartyId(): string | null {
    return this.initiatingPartyId;
  }

  setInitiatingPartyId(id: string): void {
    this.initiatingPartyId = sanitizeString(id);
  }

  getIssuer(): string | null {
    return this.issuer;
  }

  setIssuer(issuer: string): void {
    this.issuer = sanitizeString(issuer);
  }

  getCreationDateTime(): Date {
    return this.creationDateTime;
  }

  setCreationDateTime(creationDateTime: Date): void {
    this.creationDateTime = creationDateTime;
  }

  getNumberOfTransactions(): number {
    return this.numberOfTransactions;
  }

  getControlSumCents(): number {
    return this.controlSumCents;
  }

  /**
   * Replace the totals with the sum over all payment blocks
   */
  setTotals(numberOfTransactions: number, controlSumCents: number): void {
    this.numberOfTransactions = numberOfTransactions;
    this.controlSumCents = controlSumCents;
  }
}
