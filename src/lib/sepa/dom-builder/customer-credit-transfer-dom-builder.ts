/**
 * SEPA Credit Transfer DOM builder (pain.001.001.03)
 */

import { InvalidTransferTypeError } from "../errors";
import type { PaymentInformation } from "../payment-information";
import type { CustomerCreditTransferInformation } from "../transfer-information/customer-credit-transfer-information";
import type { CustomerDirectDebitTransferInformation } from "../transfer-information/customer-direct-debit-transfer-information";
import { PAIN_FORMAT_CREDIT_TRANSFER } from "../types";
import { BaseDomBuilder, type XmlElement } from "./base-dom-builder";

export class CustomerCreditTransferDomBuilder extends BaseDomBuilder {
  constructor(painFormat = PAIN_FORMAT_CREDIT_TRANSFER) {
    super(painFormat, "CstmrCdtTrfInitn");
  }

  visitPaymentInformation(paymentInformation: PaymentInformation): void {
    const element: XmlElement = {
      PmtInfId: paymentInformation.getId(),
      PmtMtd: paymentInformation.getPaymentMethod() ?? "TRF",
    };

    const batchBooking = paymentInformation.getBatchBooking();
    if (batchBooking !== null) {
      element.BtchBookg = batchBooking ? "true" : "false";
    }

    element.NbOfTxs = String(paymentInformation.getNumberOfTransactions());
    element.CtrlSum = this.intToCurrency(paymentInformation.getControlSumCents());

    if (!paymentInformation.hasHiddenGeneralSettings()) {
      element.PmtTpInf = this.createPaymentTypeElement(paymentInformation);
    }

    element.ReqdExctnDt = paymentInformation.getDueDate();

    // Debtor
    const debtor: XmlElement = { Nm: paymentInformation.getOriginName() };
    const address = this.createPostalAddressElement(paymentInformation.getCountry(), []);
    if (address) debtor.PstlAdr = address;
    const bankPartyId = paymentInformation.getOriginBankPartyIdentification();
    if (bankPartyId) {
      debtor.Id = this.createOrganisationIdElement(
        bankPartyId,
        paymentInformation.getOriginBankPartyIdentificationScheme()
      );
    }
    element.Dbtr = debtor;

    if (!paymentInformation.hasHiddenOriginAccountIBAN()) {
      element.DbtrAcct = {
        Id: this.createAccountIdElement(
          paymentInformation.getOriginAccountIBAN(),
          paymentInformation.getSchemaName()
        ),
        Ccy: paymentInformation.getOriginAccountCurrency(),
      };
    }

    element.DbtrAgt = this.createFinancialInstitutionElement(paymentInformation.getOriginAgentBIC());
    element.ChrgBr = "SLEV";

    this.openPaymentInformation(paymentInformation, element, "CdtTrfTxInf");
  }

  visitCreditTransfer(transfer: CustomerCreditTransferInformation): void {
    const element: XmlElement = {
      PmtId: this.createPaymentIdElement(transfer),
      Amt: { InstdAmt: this.createAmountElement(transfer.getTransferAmount(), transfer.getCurrency()) },
    };

    const bic = transfer.getBic();
    if (bic) {
      element.CdtrAgt = this.createFinancialInstitutionElement(bic);
    }

    const creditor: XmlElement = { Nm: transfer.getName() };
    const address = this.createPostalAddressElement(transfer.getCountry(), transfer.getPostalAddress());
    if (address) creditor.PstlAdr = address;
    element.Cdtr = creditor;

    element.CdtrAcct = { Id: this.createAccountIdElement(transfer.getIban()) };

    const ultimateCreditor = transfer.getUltimateCreditorName();
    if (ultimateCreditor) {
      element.UltmtCdtr = { Nm: ultimateCreditor };
    }

    const purposeCode = transfer.getPurposeCode();
    if (purposeCode) {
      element.Purp = { Cd: purposeCode };
    }

    const remittance = this.createRemittanceElement(transfer);
    if (remittance) element.RmtInf = remittance;

    this.appendTransaction(element);
  }

  visitDirectDebit(_transfer: CustomerDirectDebitTransferInformation): void {
    throw new InvalidTransferTypeError("Direct debits cannot be rendered into a credit transfer file");
  }

  private createPaymentTypeElement(paymentInformation: PaymentInformation): XmlElement {
    const paymentType: XmlElement = {};

    const priority = paymentInformation.getInstructionPriority();
    if (priority) paymentType.InstrPrty = priority;

    paymentType.SvcLvl = { Cd: paymentInformation.getServiceLevel() };

    const localInstrument = paymentInformation.getLocalInstrumentCode();
    if (localInstrument) paymentType.LclInstrm = { Cd: localInstrument };

    const categoryPurpose = paymentInformation.getCategoryPurposeCode();
    if (categoryPurpose) paymentType.CtgyPurp = { Cd: categoryPurpose };

    return paymentType;
  }
}
