/**
 * Payment Information block (PmtInf)
 *
 * Groups transfers that share one origin account, one execution date and one
 * payment method. Keeps NbOfTxs / CtrlSum in step with the attached transfers
 * and rejects out-of-schema code values before anything is rendered.
 */

import { format, isValid } from "date-fns";
import type { DomBuilder } from "./dom-builder/types";
import { InvalidConfigurationError } from "./errors";
import type { TransferInformation } from "./transfer-information";
import {
  INSTRUCTION_PRIORITIES,
  LOCAL_INSTRUMENT_CODES,
  SCHEMA_NAMES,
  SEQUENCE_TYPES,
  SERVICE_LEVELS,
  isOneOf,
  type InstructionPriority,
  type LocalInstrumentCode,
  type SchemaName,
  type SequenceType,
  type ServiceLevel,
} from "./types";
import { isDueDateFormat } from "./util/date-format";
import { sanitizeString } from "./util/string-helper";

export class PaymentInformation<T extends TransferInformation = TransferInformation> {
  static readonly S_FIRST: SequenceType = "FRST";
  static readonly S_RECURRING: SequenceType = "RCUR";
  static readonly S_ONEOFF: SequenceType = "OOFF";
  static readonly S_FINAL: SequenceType = "FNAL";

  /** Must be unambiguous within the file; uniqueness is up to the caller */
  protected id: string;
  protected originName: string;
  protected originAccountIBAN: string;
  protected originAgentBIC: string;
  protected originAccountCurrency: string;
  protected originBankPartyIdentification: string | null = null;
  /** Coded scheme name, 1-4 characters */
  protected originBankPartyIdentificationScheme: string | null = null;
  /** Creditor scheme id, mandatory for direct debits */
  protected creditorId: string | null = null;

  protected dueDate: Date;
  /** date-fns pattern */
  protected dateFormat = "yyyy-MM-dd";
  protected categoryPurposeCode: string | null = null;
  protected instructionPriority: InstructionPriority | null = null;
  protected serviceLevel: ServiceLevel = "SEPA";
  protected schemaName: SchemaName = "IBAN";
  protected localInstrumentCode: LocalInstrumentCode | null = null;
  protected sequenceType: SequenceType | null = null;
  protected batchBooking: boolean | null = null;
  protected mandateSignDate: Date | null = null;
  protected country: string | null = null;

  protected paymentMethod: string | null = null;
  /** Injected by the owning transfer file */
  protected validPaymentMethods: readonly string[] = [];

  protected controlSumCents = 0;
  protected numberOfTransactions = 0;
  protected transfers: T[] = [];

  protected hideOriginAccountIBANFlag = false;
  protected hideGeneralSettingsFlag = false;

  constructor(
    id: string,
    originAccountIBAN: string,
    originAgentBIC: string,
    originName: string,
    originAccountCurrency = "EUR"
  ) {
    this.id = id;
    this.originAccountIBAN = originAccountIBAN;
    this.originAgentBIC = originAgentBIC;
    this.originName = sanitizeString(originName);
    this.originAccountCurrency = originAccountCurrency;
    this.dueDate = new Date();
  }

  // ==========================================================================
  // TRANSFERS & TRAVERSAL
  // ==========================================================================

  /**
   * Attach a transfer. This is the only path that changes the aggregates;
   * transfers cannot be detached again.
   */
  addTransfer(transfer: T): void {
    this.transfers.push(transfer);
    this.numberOfTransactions++;
    this.controlSumCents += transfer.getTransferAmount();
  }

  getTransfers(): readonly T[] {
    return [...this.transfers];
  }

  /**
   * Visit this block first, then each transfer in insertion order.
   */
  accept(domBuilder: DomBuilder): void {
    domBuilder.visitPaymentInformation(this);
    for (const transfer of this.transfers) {
      transfer.accept(domBuilder);
    }
  }

  getControlSumCents(): number {
    return this.controlSumCents;
  }

  getNumberOfTransactions(): number {
    return this.numberOfTransactions;
  }

  // ==========================================================================
  // VALIDATED SETTERS
  // ==========================================================================

  setValidPaymentMethods(validPaymentMethods: readonly string[]): void {
    this.validPaymentMethods = [...validPaymentMethods];
  }

  getValidPaymentMethods(): readonly string[] {
    return this.validPaymentMethods;
  }

  /**
   * @throws InvalidConfigurationError unless the method is in the injected whitelist
   */
  setPaymentMethod(method: string): void {
    const candidate = method.toUpperCase();
    if (!this.validPaymentMethods.includes(candidate)) {
      throw new InvalidConfigurationError(
        `Invalid Payment Method: ${candidate}, must be one of ${this.validPaymentMethods.join(",")}`,
        "paymentMethod"
      );
    }
    this.paymentMethod = candidate;
  }

  getPaymentMethod(): string | null {
    return this.paymentMethod;
  }

  setLocalInstrumentCode(localInstrumentCode: string): void {
    const candidate = localInstrumentCode.toUpperCase();
    if (!isOneOf(LOCAL_INSTRUMENT_CODES, candidate)) {
      throw new InvalidConfigurationError(
        `Invalid Local Instrument Code: ${candidate}`,
        "localInstrumentCode"
      );
    }
    this.localInstrumentCode = candidate;
  }

  getLocalInstrumentCode(): LocalInstrumentCode | null {
    return this.localInstrumentCode;
  }

  setInstructionPriority(instructionPriority: string): void {
    const candidate = instructionPriority.toUpperCase();
    if (!isOneOf(INSTRUCTION_PRIORITIES, candidate)) {
      throw new InvalidConfigurationError(
        `Invalid Instruction Priority: ${candidate}`,
        "instructionPriority"
      );
    }
    this.instructionPriority = candidate;
  }

  getInstructionPriority(): InstructionPriority | null {
    return this.instructionPriority;
  }

  setServiceLevel(serviceLevel: string): void {
    const candidate = serviceLevel.toUpperCase();
    if (!isOneOf(SERVICE_LEVELS, candidate)) {
      throw new InvalidConfigurationError(`Invalid Service Level: ${candidate}`, "serviceLevel");
    }
    this.serviceLevel = candidate;
  }

  getServiceLevel(): ServiceLevel {
    return this.serviceLevel;
  }

  setSchemaName(schemaName: string): void {
    const candidate = schemaName.toUpperCase();
    if (!isOneOf(SCHEMA_NAMES, candidate)) {
      throw new InvalidConfigurationError(`Invalid Schema Name: ${candidate}`, "schemaName");
    }
    this.schemaName = candidate;
  }

  getSchemaName(): SchemaName {
    return this.schemaName;
  }

  setSequenceType(sequenceType: string): void {
    const candidate = sequenceType.toUpperCase();
    if (!isOneOf(SEQUENCE_TYPES, candidate)) {
      throw new InvalidConfigurationError(`Invalid Sequence Type: ${candidate}`, "sequenceType");
    }
    this.sequenceType = candidate;
  }

  getSequenceType(): SequenceType | null {
    return this.sequenceType;
  }

  // ==========================================================================
  // ORIGIN PARTY
  // ==========================================================================

  getId(): string {
    return this.id;
  }

  setId(id: string): void {
    this.id = id;
  }

  getOriginName(): string {
    return this.originName;
  }

  setOriginName(originName: string): void {
    this.originName = sanitizeString(originName);
  }

  getOriginAccountIBAN(): string {
    return this.originAccountIBAN;
  }

  setOriginAccountIBAN(originAccountIBAN: string): void {
    this.originAccountIBAN = originAccountIBAN;
  }

  getOriginAgentBIC(): string {
    return this.originAgentBIC;
  }

  setOriginAgentBIC(originAgentBIC: string): void {
    this.originAgentBIC = originAgentBIC;
  }

  getOriginAccountCurrency(): string {
    return this.originAccountCurrency;
  }

  setOriginAccountCurrency(originAccountCurrency: string): void {
    this.originAccountCurrency = originAccountCurrency;
  }

  getOriginBankPartyIdentification(): string | null {
    return this.originBankPartyIdentification;
  }

  setOriginBankPartyIdentification(id: string): void {
    this.originBankPartyIdentification = sanitizeString(id);
  }

  getOriginBankPartyIdentificationScheme(): string | null {
    return this.originBankPartyIdentificationScheme;
  }

  setOriginBankPartyIdentificationScheme(scheme: string): void {
    this.originBankPartyIdentificationScheme = sanitizeString(scheme);
  }

  getCreditorId(): string | null {
    return this.creditorId;
  }

  setCreditorId(creditorSchemeId: string): void {
    this.creditorId = sanitizeString(creditorSchemeId);
  }

  getCountry(): string | null {
    return this.country;
  }

  setCountry(country: string): void {
    this.country = country;
  }

  // ==========================================================================
  // EXECUTION METADATA
  // ==========================================================================

  /**
   * Due date rendered with the configured date format
   */
  getDueDate(): string {
    return format(this.dueDate, this.dateFormat);
  }

  getDueDateValue(): Date {
    return this.dueDate;
  }

  setDueDate(dueDate: Date): void {
    if (!isValid(dueDate)) {
      throw new InvalidConfigurationError("Invalid Due Date", "dueDate");
    }
    this.dueDate = dueDate;
  }

  /**
   * @throws InvalidConfigurationError unless the pattern renders a readable calendar day
   */
  setDueDateFormat(dateFormat: string): void {
    if (!isDueDateFormat(dateFormat)) {
      throw new InvalidConfigurationError(`Invalid Due Date Format: ${dateFormat}`, "dateFormat");
    }
    this.dateFormat = dateFormat;
  }

  getCategoryPurposeCode(): string | null {
    return this.categoryPurposeCode;
  }

  setCategoryPurposeCode(categoryPurposeCode: string): void {
    this.categoryPurposeCode = categoryPurposeCode;
  }

  getMandateSignDate(): Date | null {
    return this.mandateSignDate;
  }

  setMandateSignDate(mandateSignDate: Date): void {
    if (!isValid(mandateSignDate)) {
      throw new InvalidConfigurationError("Invalid Mandate Sign Date", "mandateSignDate");
    }
    this.mandateSignDate = mandateSignDate;
  }

  /** null = leave BtchBookg out and let the bank decide */
  getBatchBooking(): boolean | null {
    return this.batchBooking;
  }

  setBatchBooking(batchBooking: boolean): void {
    this.batchBooking = batchBooking;
  }

  // ==========================================================================
  // DISPLAY FLAGS (set once, never cleared)
  // ==========================================================================

  hideOriginAccountIBAN(): void {
    this.hideOriginAccountIBANFlag = true;
  }

  hasHiddenOriginAccountIBAN(): boolean {
    return this.hideOriginAccountIBANFlag;
  }

  hideGeneralSettings(): void {
    this.hideGeneralSettingsFlag = true;
  }

  hasHiddenGeneralSettings(): boolean {
    return this.hideGeneralSettingsFlag;
  }
}
