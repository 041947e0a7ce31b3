import { describe, it, expect, vi, afterEach } from "vitest";
import { InvalidConfigurationError } from "../errors";
import { PaymentInformation } from "../payment-information";
import { CustomerCreditTransferInformation } from "../transfer-information/customer-credit-transfer-information";
import { RecordingDomBuilder } from "./helpers";

function makePayment(): PaymentInformation<CustomerCreditTransferInformation> {
  return new PaymentInformation<CustomerCreditTransferInformation>(
    "PAY-1",
    "FR7630006000011234567890189",
    "AGRIFRPP",
    "ACME"
  );
}

function makeTransfer(amountCents: number, endToEndId = "E2E"): CustomerCreditTransferInformation {
  return new CustomerCreditTransferInformation(amountCents, "DE89370400440532013000", "Creditor", endToEndId);
}

describe("PaymentInformation", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  // ----------------------------------------------------------------
  // Construction
  // ----------------------------------------------------------------
  describe("construction", () => {
    it("stores identity fields and defaults", () => {
      const payment = makePayment();
      expect(payment.getId()).toBe("PAY-1");
      expect(payment.getOriginAccountIBAN()).toBe("FR7630006000011234567890189");
      expect(payment.getOriginAgentBIC()).toBe("AGRIFRPP");
      expect(payment.getOriginName()).toBe("ACME");
      expect(payment.getOriginAccountCurrency()).toBe("EUR");
      expect(payment.getServiceLevel()).toBe("SEPA");
      expect(payment.getSchemaName()).toBe("IBAN");
      expect(payment.getBatchBooking()).toBeNull();
      expect(payment.getPaymentMethod()).toBeNull();
      expect(payment.getNumberOfTransactions()).toBe(0);
      expect(payment.getControlSumCents()).toBe(0);
    });

    it("accepts a different account currency", () => {
      const payment = new PaymentInformation("PAY-2", "CH9300762011623852957", "UBSWCHZH80A", "ACME", "CHF");
      expect(payment.getOriginAccountCurrency()).toBe("CHF");
    });

    it("sanitizes the origin name", () => {
      const payment = new PaymentInformation("PAY-3", "DE89370400440532013000", "COBADEFFXXX", "Müller & Söhne");
      expect(payment.getOriginName()).toBe("Mueller + Soehne");
    });

    it("defaults the due date to the construction time", () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date(2026, 0, 15, 12, 0, 0));
      const payment = makePayment();
      expect(payment.getDueDate()).toBe("2026-01-15");
    });

    it("renders the due date with a custom format", () => {
      const payment = makePayment();
      payment.setDueDate(new Date(2026, 6, 3));
      payment.setDueDateFormat("dd.MM.yyyy");
      expect(payment.getDueDate()).toBe("03.07.2026");
    });
  });

  // ----------------------------------------------------------------
  // Aggregation
  // ----------------------------------------------------------------
  describe("addTransfer", () => {
    it("keeps count and control sum exact after every attachment", () => {
      const payment = makePayment();
      const amounts = [1, 999, 1000, 2500, 10, 123456789];
      let expectedSum = 0;

      amounts.forEach((amount, index) => {
        payment.addTransfer(makeTransfer(amount, `E2E-${index}`));
        expectedSum += amount;
        expect(payment.getNumberOfTransactions()).toBe(index + 1);
        expect(payment.getControlSumCents()).toBe(expectedSum);
      });
    });

    it("sums amounts that would drift as floats", () => {
      const payment = makePayment();
      payment.addTransfer(makeTransfer(10));
      payment.addTransfer(makeTransfer(20));
      // 0.10 + 0.20 in floating point is 0.30000000000000004
      expect(payment.getControlSumCents()).toBe(30);
    });

    it("returns transfers in insertion order", () => {
      const payment = makePayment();
      const first = makeTransfer(100, "T1");
      const second = makeTransfer(200, "T2");
      payment.addTransfer(first);
      payment.addTransfer(second);
      expect(payment.getTransfers()).toEqual([first, second]);
    });

    it("does not let callers change the aggregate through getTransfers", () => {
      const payment = makePayment();
      payment.addTransfer(makeTransfer(100));
      const snapshot = payment.getTransfers();
      expect(snapshot).toHaveLength(1);
      payment.addTransfer(makeTransfer(100));
      expect(snapshot).toHaveLength(1);
      expect(payment.getTransfers()).toHaveLength(2);
    });
  });

  // ----------------------------------------------------------------
  // Traversal
  // ----------------------------------------------------------------
  describe("accept", () => {
    it("visits the block once, before its transfers, in attachment order", () => {
      const payment = makePayment();
      payment.addTransfer(makeTransfer(100, "T1"));
      payment.addTransfer(makeTransfer(200, "T2"));
      payment.addTransfer(makeTransfer(300, "T3"));

      const builder = new RecordingDomBuilder();
      payment.accept(builder);

      expect(builder.calls).toEqual(["payment:PAY-1", "credit:T1", "credit:T2", "credit:T3"]);
    });

    it("visits only the block when no transfers are attached", () => {
      const builder = new RecordingDomBuilder();
      makePayment().accept(builder);
      expect(builder.calls).toEqual(["payment:PAY-1"]);
    });
  });

  // ----------------------------------------------------------------
  // Payment method whitelist
  // ----------------------------------------------------------------
  describe("setPaymentMethod", () => {
    it("rejects every method while no whitelist is injected", () => {
      const payment = makePayment();
      expect(() => payment.setPaymentMethod("TRF")).toThrow(InvalidConfigurationError);
      expect(payment.getPaymentMethod()).toBeNull();
    });

    it("accepts a whitelisted method in any case and stores it upper-cased", () => {
      const payment = makePayment();
      payment.setValidPaymentMethods(["TRF"]);
      payment.setPaymentMethod("trf");
      expect(payment.getPaymentMethod()).toBe("TRF");
    });

    it("rejects a method missing from the whitelist and keeps the previous one", () => {
      const payment = makePayment();
      payment.setValidPaymentMethods(["TRF"]);
      payment.setPaymentMethod("TRF");
      expect(() => payment.setPaymentMethod("DD")).toThrow("Invalid Payment Method: DD, must be one of TRF");
      expect(payment.getPaymentMethod()).toBe("TRF");
    });

    it("names the rejected field on the error", () => {
      const payment = makePayment();
      let caught: unknown;
      try {
        payment.setPaymentMethod("CHK");
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidConfigurationError);
      expect(caught).toMatchObject({ field: "paymentMethod" });
    });
  });

  // ----------------------------------------------------------------
  // Closed enumerations
  // ----------------------------------------------------------------
  describe("enumeration setters", () => {
    const cases = [
      {
        name: "local instrument code",
        valid: ["b2b", "CORE", "Cor1", "in", "ONCL"],
        invalid: ["COR2", "", "SEPA"],
        set: (p: PaymentInformation, v: string) => p.setLocalInstrumentCode(v),
        get: (p: PaymentInformation) => p.getLocalInstrumentCode(),
      },
      {
        name: "instruction priority",
        valid: ["norm", "HIGH"],
        invalid: ["LOW", "URGENT"],
        set: (p: PaymentInformation, v: string) => p.setInstructionPriority(v),
        get: (p: PaymentInformation) => p.getInstructionPriority(),
      },
      {
        name: "service level",
        valid: ["sepa", "Nurg"],
        invalid: ["FOO", "PRPT"],
        set: (p: PaymentInformation, v: string) => p.setServiceLevel(v),
        get: (p: PaymentInformation) => p.getServiceLevel(),
      },
      {
        name: "schema name",
        valid: ["iban", "BBAN"],
        invalid: ["UPIC"],
        set: (p: PaymentInformation, v: string) => p.setSchemaName(v),
        get: (p: PaymentInformation) => p.getSchemaName(),
      },
      {
        name: "sequence type",
        valid: ["frst", "RCUR", "ooff", "FNAL"],
        invalid: ["FIRST", "RPRE"],
        set: (p: PaymentInformation, v: string) => p.setSequenceType(v),
        get: (p: PaymentInformation) => p.getSequenceType(),
      },
    ];

    for (const testCase of cases) {
      it(`normalizes valid ${testCase.name} values to upper case`, () => {
        for (const value of testCase.valid) {
          const payment = makePayment();
          testCase.set(payment, value);
          expect(testCase.get(payment)).toBe(value.toUpperCase());
        }
      });

      it(`rejects invalid ${testCase.name} values without changing the stored value`, () => {
        const payment = makePayment();
        const before = testCase.get(payment);
        for (const value of testCase.invalid) {
          expect(() => testCase.set(payment, value)).toThrow(InvalidConfigurationError);
          expect(testCase.get(payment)).toBe(before);
        }
      });
    }

    it("keeps the previous service level when FOO is rejected", () => {
      const payment = makePayment();
      expect(() => payment.setServiceLevel("FOO")).toThrow(InvalidConfigurationError);
      expect(payment.getServiceLevel()).toBe("SEPA");
    });

    it("keeps a previously set local instrument code after a rejection", () => {
      const payment = makePayment();
      payment.setLocalInstrumentCode("CORE");
      expect(() => payment.setLocalInstrumentCode("XYZ")).toThrow("Invalid Local Instrument Code: XYZ");
      expect(payment.getLocalInstrumentCode()).toBe("CORE");
    });

    it("exposes the sequence type constants", () => {
      expect(PaymentInformation.S_FIRST).toBe("FRST");
      expect(PaymentInformation.S_RECURRING).toBe("RCUR");
      expect(PaymentInformation.S_ONEOFF).toBe("OOFF");
      expect(PaymentInformation.S_FINAL).toBe("FNAL");
    });
  });

  // ----------------------------------------------------------------
  // Sanitized identity fields
  // ----------------------------------------------------------------
  describe("sanitized setters", () => {
    it("sanitizes bank party identification, scheme and creditor id", () => {
      const payment = makePayment();
      payment.setOriginBankPartyIdentification("  ACME #4711 ");
      payment.setOriginBankPartyIdentificationScheme("CUST");
      payment.setCreditorId("DE98ZZZ09999999999 ");
      expect(payment.getOriginBankPartyIdentification()).toBe("ACME 4711");
      expect(payment.getOriginBankPartyIdentificationScheme()).toBe("CUST");
      expect(payment.getCreditorId()).toBe("DE98ZZZ09999999999");
    });

    it("sanitizes a replaced origin name", () => {
      const payment = makePayment();
      payment.setOriginName("Café Crème");
      expect(payment.getOriginName()).toBe("Cafe Creme");
    });
  });

  // ----------------------------------------------------------------
  // Sticky display flags
  // ----------------------------------------------------------------
  describe("display flags", () => {
    it("start cleared", () => {
      const payment = makePayment();
      expect(payment.hasHiddenOriginAccountIBAN()).toBe(false);
      expect(payment.hasHiddenGeneralSettings()).toBe(false);
    });

    it("stay set through later mutations", () => {
      const payment = makePayment();
      payment.hideOriginAccountIBAN();
      payment.hideGeneralSettings();

      payment.setOriginAccountIBAN("DE89370400440532013000");
      payment.setServiceLevel("NURG");
      payment.setBatchBooking(false);
      payment.addTransfer(makeTransfer(100));

      expect(payment.hasHiddenOriginAccountIBAN()).toBe(true);
      expect(payment.hasHiddenGeneralSettings()).toBe(true);
    });

    it("are independent of each other", () => {
      const payment = makePayment();
      payment.hideOriginAccountIBAN();
      expect(payment.hasHiddenOriginAccountIBAN()).toBe(true);
      expect(payment.hasHiddenGeneralSettings()).toBe(false);
    });
  });

  // ----------------------------------------------------------------
  // Scenario
  // ----------------------------------------------------------------
  it("assembles a credit transfer block", () => {
    const payment = makePayment();
    payment.setValidPaymentMethods(["TRF"]);
    payment.setPaymentMethod("trf");
    payment.addTransfer(makeTransfer(1000, "T1"));
    payment.addTransfer(makeTransfer(2500, "T2"));

    expect(payment.getPaymentMethod()).toBe("TRF");
    expect(payment.getNumberOfTransactions()).toBe(2);
    expect(payment.getControlSumCents()).toBe(3500);

    expect(() => payment.setServiceLevel("FOO")).toThrow(InvalidConfigurationError);
    expect(payment.getServiceLevel()).toBe("SEPA");
  });

  // ----------------------------------------------------------------
  // Due date
  // ----------------------------------------------------------------
  describe("due date validation", () => {
    it.each(["YYYY-MM-DD", "Y-m-d", "yyyy-dd", "'due'"])("rejects the due date format %s", (pattern) => {
      const payment = makePayment();
      payment.setDueDate(new Date(2026, 6, 3));

      let caught: unknown;
      try {
        payment.setDueDateFormat(pattern);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidConfigurationError);
      expect(caught).toMatchObject({ field: "dateFormat" });
      expect(payment.getDueDate()).toBe("2026-07-03");
    });

    it("rejects an invalid due date and keeps the previous one", () => {
      const payment = makePayment();
      payment.setDueDate(new Date(2026, 6, 3));

      expect(() => payment.setDueDate(new Date(Number.NaN))).toThrow("Invalid Due Date");
      expect(payment.getDueDate()).toBe("2026-07-03");
    });

    it("rejects an invalid mandate sign date", () => {
      const payment = makePayment();
      expect(() => payment.setMandateSignDate(new Date("not a date"))).toThrow(InvalidConfigurationError);
      expect(payment.getMandateSignDate()).toBeNull();
    });
  });
});
