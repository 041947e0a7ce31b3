import { getSepaConfig } from "../config";
import { PaymentInformation } from "../payment-information";
import { CustomerDirectDebitTransferInformation } from "../transfer-information/customer-direct-debit-transfer-information";
import { parseAmountToCents } from "../util/amount";
import { BaseCustomerFacade } from "./base-facade";
import {
  debitPaymentInfoSchema,
  directDebitSchema,
  type DebitPaymentInfoInput,
  type DirectDebitInput,
} from "./schemas";

export class CustomerDirectDebitFacade extends BaseCustomerFacade<CustomerDirectDebitTransferInformation> {
  addPaymentInfo(
    paymentName: string,
    input: DebitPaymentInfoInput
  ): PaymentInformation<CustomerDirectDebitTransferInformation> {
    const data = this.parseInput(debitPaymentInfoSchema, input, "payment information");

    const paymentInformation = new PaymentInformation<CustomerDirectDebitTransferInformation>(
      data.id,
      data.creditorAccountIBAN,
      data.creditorAgentBIC ?? "",
      data.creditorName,
      data.creditorAccountCurrency ?? getSepaConfig().defaultCurrency
    );
    this.applyPaymentSettings(paymentInformation, data);
    paymentInformation.setCreditorId(data.creditorId);
    paymentInformation.setSequenceType(data.seqType);
    if (!data.localInstrumentCode) paymentInformation.setLocalInstrumentCode("CORE");
    if (data.mandateSignDate) paymentInformation.setMandateSignDate(data.mandateSignDate);

    this.registerPayment(paymentName, paymentInformation);
    return paymentInformation;
  }

  addTransfer(paymentName: string, input: DirectDebitInput): CustomerDirectDebitTransferInformation {
    const paymentInformation = this.getPaymentInformation(paymentName);
    const data = this.parseInput(directDebitSchema, input, "direct debit");

    const transfer = new CustomerDirectDebitTransferInformation(
      parseAmountToCents(data.amount),
      data.debtorIBAN,
      data.debtorName,
      data.endToEndId
    );
    transfer.setMandateId(data.debtorMandate);
    if (data.debtorMandateSignDate) transfer.setMandateSignDate(data.debtorMandateSignDate);
    if (data.debtorBIC) transfer.setBic(data.debtorBIC);
    if (data.originalMandateId) transfer.setOriginalMandateId(data.originalMandateId);
    if (data.originalDebtorIBAN) transfer.setOriginalDebtorIban(data.originalDebtorIBAN);
    if (data.amendedDebtorAccount) transfer.setAmendedDebtorAccount();
    this.applyTransferSettings(transfer, data);

    paymentInformation.addTransfer(transfer);
    return transfer;
  }
}
