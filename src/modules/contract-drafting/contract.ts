import type { Contract } from "./types.js";

const moneyFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

const effectiveDateFormat = new Intl.DateTimeFormat("en-US", {
  year: "numeric",
  month: "long",
  day: "numeric",
  timeZone: "UTC"
});

export function formatMoney(value: number): string {
  return `$${moneyFormat.format(value)}`;
}

export function formatEffectiveDate(date: Date): string {
  return effectiveDateFormat.format(date);
}

/** Full agreement text: each section under its underlined heading. */
export function renderContractText(contract: Contract): string {
  return contract.sections
    .map(({ heading, content }) => `${heading}\n${"=".repeat(heading.length)}\n${content}`)
    .join("\n\n");
}

export function formatContractSummary(contract: Contract): string {
  return [
    `CONTRACT: ${contract.title}`,
    `ID: ${contract.contract_id}`,
    `Supplier: ${contract.supplier_name}`,
    `Type: ${contract.contract_type}`,
    `Value: ${formatMoney(contract.total_value)}`,
    `Duration: ${contract.duration_days} days`,
    `Status: ${contract.status}`,
    `Sections: ${contract.sections.map((section) => section.heading).join(", ")}`
  ].join("\n");
}
