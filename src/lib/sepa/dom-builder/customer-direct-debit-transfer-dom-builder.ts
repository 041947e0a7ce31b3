/**
 * SEPA Direct Debit DOM builder (pain.008.001.02)
 */

import { format } from "date-fns";
import { InvalidTransferFileConfigurationError, InvalidTransferTypeError } from "../errors";
import type { PaymentInformation } from "../payment-information";
import type { CustomerCreditTransferInformation } from "../transfer-information/customer-credit-transfer-information";
import type { CustomerDirectDebitTransferInformation } from "../transfer-information/customer-direct-debit-transfer-information";
import { PAIN_FORMAT_DIRECT_DEBIT } from "../types";
import { BaseDomBuilder, type XmlElement } from "./base-dom-builder";

export class CustomerDirectDebitTransferDomBuilder extends BaseDomBuilder {
  constructor(painFormat = PAIN_FORMAT_DIRECT_DEBIT) {
    super(painFormat, "CstmrDrctDbtInitn");
  }

  visitPaymentInformation(paymentInformation: PaymentInformation): void {
    const element: XmlElement = {
      PmtInfId: paymentInformation.getId(),
      PmtMtd: paymentInformation.getPaymentMethod() ?? "DD",
    };

    const batchBooking = paymentInformation.getBatchBooking();
    if (batchBooking !== null) {
      element.BtchBookg = batchBooking ? "true" : "false";
    }

    element.NbOfTxs = String(paymentInformation.getNumberOfTransactions());
    element.CtrlSum = this.intToCurrency(paymentInformation.getControlSumCents());

    if (!paymentInformation.hasHiddenGeneralSettings()) {
      const paymentType: XmlElement = { SvcLvl: { Cd: paymentInformation.getServiceLevel() } };
      const localInstrument = paymentInformation.getLocalInstrumentCode();
      if (localInstrument) paymentType.LclInstrm = { Cd: localInstrument };
      const sequenceType = paymentInformation.getSequenceType();
      if (sequenceType) paymentType.SeqTp = sequenceType;
      const categoryPurpose = paymentInformation.getCategoryPurposeCode();
      if (categoryPurpose) paymentType.CtgyPurp = { Cd: categoryPurpose };
      element.PmtTpInf = paymentType;
    }

    element.ReqdColltnDt = paymentInformation.getDueDate();

    const creditor: XmlElement = { Nm: paymentInformation.getOriginName() };
    const address = this.createPostalAddressElement(paymentInformation.getCountry(), []);
    if (address) creditor.PstlAdr = address;
    element.Cdtr = creditor;

    if (!paymentInformation.hasHiddenOriginAccountIBAN()) {
      element.CdtrAcct = {
        Id: this.createAccountIdElement(
          paymentInformation.getOriginAccountIBAN(),
          paymentInformation.getSchemaName()
        ),
        Ccy: paymentInformation.getOriginAccountCurrency(),
      };
    }

    element.CdtrAgt = this.createFinancialInstitutionElement(paymentInformation.getOriginAgentBIC());
    element.ChrgBr = "SLEV";

    const creditorId = paymentInformation.getCreditorId();
    if (creditorId) {
      element.CdtrSchmeId = {
        Id: { PrvtId: { Othr: { Id: creditorId, SchmeNm: { Prtry: "SEPA" } } } },
      };
    }

    this.openPaymentInformation(paymentInformation, element, "DrctDbtTxInf");
  }

  visitDirectDebit(transfer: CustomerDirectDebitTransferInformation): void {
    const signDate =
      transfer.getMandateSignDate() ?? this.currentPaymentInformation?.getMandateSignDate() ?? null;
    if (!signDate) {
      throw new InvalidTransferFileConfigurationError(
        `Direct debit ${transfer.getEndToEndIdentification()} has no mandate sign date`
      );
    }

    const mandate: XmlElement = {
      MndtId: transfer.getMandateId() ?? "",
      DtOfSgntr: format(signDate, "yyyy-MM-dd"),
    };

    if (transfer.hasAmendments()) {
      mandate.AmdmntInd = "true";
      const details: XmlElement = {};
      const originalMandateId = transfer.getOriginalMandateId();
      if (originalMandateId) details.OrgnlMndtId = originalMandateId;
      const originalIban = transfer.getOriginalDebtorIban();
      if (originalIban) details.OrgnlDbtrAcct = { Id: { IBAN: originalIban } };
      if (transfer.hasAmendedDebtorAccount()) {
        details.OrgnlDbtrAgt = { FinInstnId: { Othr: { Id: "SMNDA" } } };
      }
      mandate.AmdmntInfDtls = details;
    }

    const element: XmlElement = {
      PmtId: this.createPaymentIdElement(transfer),
      InstdAmt: this.createAmountElement(transfer.getTransferAmount(), transfer.getCurrency()),
      DrctDbtTx: { MndtRltdInf: mandate },
      DbtrAgt: this.createFinancialInstitutionElement(transfer.getBic()),
    };

    const debtor: XmlElement = { Nm: transfer.getName() };
    const address = this.createPostalAddressElement(transfer.getCountry(), transfer.getPostalAddress());
    if (address) debtor.PstlAdr = address;
    element.Dbtr = debtor;

    element.DbtrAcct = { Id: this.createAccountIdElement(transfer.getIban()) };

    const remittance = this.createRemittanceElement(transfer);
    if (remittance) element.RmtInf = remittance;

    this.appendTransaction(element);
  }

  visitCreditTransfer(_transfer: CustomerCreditTransferInformation): void {
    throw new InvalidTransferTypeError("Credit transfers cannot be rendered into a direct debit file");
  }
}
