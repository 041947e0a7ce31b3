import { GroupHeader } from "../group-header";
import { CustomerCreditTransferFile } from "../transfer-file/customer-credit-transfer-file";
import { CustomerDirectDebitTransferFile } from "../transfer-file/customer-direct-debit-transfer-file";
import { CustomerCreditFacade } from "./customer-credit-facade";
import { CustomerDirectDebitFacade } from "./customer-direct-debit-facade";

export { CustomerCreditFacade } from "./customer-credit-facade";
export { CustomerDirectDebitFacade } from "./customer-direct-debit-facade";
export type {
  CreditPaymentInfoInput,
  CreditTransferInput,
  DebitPaymentInfoInput,
  DirectDebitInput,
} from "./schemas";

export function createCustomerCredit(messageId: string, initiatingPartyName: string): CustomerCreditFacade {
  return new CustomerCreditFacade(new CustomerCreditTransferFile(new GroupHeader(messageId, initiatingPartyName)));
}

export function createCustomerDirectDebit(
  messageId: string,
  initiatingPartyName: string
): CustomerDirectDebitFacade {
  return new CustomerDirectDebitFacade(
    new CustomerDirectDebitTransferFile(new GroupHeader(messageId, initiatingPartyName))
  );
}
