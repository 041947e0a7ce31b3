import { getSepaConfig } from "../config";
import { PaymentInformation } from "../payment-information";
import { CustomerCreditTransferInformation } from "../transfer-information/customer-credit-transfer-information";
import { parseAmountToCents } from "../util/amount";
import { BaseCustomerFacade } from "./base-facade";
import {
  creditPaymentInfoSchema,
  creditTransferSchema,
  type CreditPaymentInfoInput,
  type CreditTransferInput,
} from "./schemas";

export class CustomerCreditFacade extends BaseCustomerFacade<CustomerCreditTransferInformation> {
  addPaymentInfo(
    paymentName: string,
    input: CreditPaymentInfoInput
  ): PaymentInformation<CustomerCreditTransferInformation> {
    const data = this.parseInput(creditPaymentInfoSchema, input, "payment information");

    const paymentInformation = new PaymentInformation<CustomerCreditTransferInformation>(
      data.id,
      data.debtorAccountIBAN,
      data.debtorAgentBIC ?? "",
      data.debtorName,
      data.debtorAccountCurrency ?? getSepaConfig().defaultCurrency
    );
    this.applyPaymentSettings(paymentInformation, data);
    if (data.instructionPriority) paymentInformation.setInstructionPriority(data.instructionPriority);

    this.registerPayment(paymentName, paymentInformation);
    return paymentInformation;
  }

  addTransfer(paymentName: string, input: CreditTransferInput): CustomerCreditTransferInformation {
    const paymentInformation = this.getPaymentInformation(paymentName);
    const data = this.parseInput(creditTransferSchema, input, "credit transfer");

    const transfer = new CustomerCreditTransferInformation(
      parseAmountToCents(data.amount),
      data.creditorIBAN,
      data.creditorName,
      data.endToEndId
    );
    if (data.creditorBIC) transfer.setBic(data.creditorBIC);
    if (data.purposeCode) transfer.setPurposeCode(data.purposeCode);
    if (data.ultimateCreditorName) transfer.setUltimateCreditorName(data.ultimateCreditorName);
    this.applyTransferSettings(transfer, data);

    paymentInformation.addTransfer(transfer);
    return transfer;
  }
}
