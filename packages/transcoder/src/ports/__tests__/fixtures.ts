import { defineTranscoding } from "../../core/define-transcoding"

export class Money {
  constructor(
    readonly amount: number,
    readonly currency: string,
  ) {}
}

export class Invoice {
  constructor(
    readonly id: string,
    readonly issuedAt: Date,
    readonly lines: Money[],
  ) {}
}

type InvoiceData = { id: string; issuedAt: Date; lines: Money[] }

export const moneyAsList = defineTranscoding({
  type: Money,
  name: "money",
  encode: (money: Money): [number, string] => [money.amount, money.currency],
  decode: ([amount, currency]: [number, string]) => new Money(amount, currency),
})

/** Payload holds further custom values (a Date and Money lines). */
export const invoiceAsMap = defineTranscoding({
  type: Invoice,
  name: "invoice",
  encode: (invoice: Invoice): InvoiceData => ({
    id: invoice.id,
    issuedAt: invoice.issuedAt,
    lines: invoice.lines,
  }),
  decode: (data: InvoiceData) => new Invoice(data.id, data.issuedAt, data.lines),
})

export class Widget {
  readonly label = "widget"
}

export const issuedAt = new Date("2024-01-15T10:30:00.000Z")
