"use client";

import { Input, Textarea } from "@rigtrack/ui";
import { FormField } from "@/components/forms/form-field";

export interface ProductionFormValues {
  name: string;
  startDate: string;
  endDate: string;
  notes: string;
}

export const emptyProduction: ProductionFormValues = {
  name: "",
  startDate: "",
  endDate: "",
  notes: "",
};

export function ProductionForm({
  values,
  onChange,
  errorFor,
}: {
  values: ProductionFormValues;
  onChange: (values: ProductionFormValues) => void;
  errorFor: (field: keyof ProductionFormValues) => string | undefined;
}) {
  const set =
    (field: keyof ProductionFormValues) =>
    (e: React.ChangeEvent<HTMLInputElement | HTMLTextAreaElement>) =>
      onChange({ ...values, [field]: e.target.value });

  return (
    <div className="space-y-4">
      <FormField id="production-name" label="Name" error={errorFor("name")}>
        <Input id="production-name" value={values.name} onChange={set("name")} />
      </FormField>
      <div className="grid grid-cols-2 gap-4">
        <FormField id="production-start" label="Start date" error={errorFor("startDate")}>
          <Input
            id="production-start"
            type="date"
            value={values.startDate}
            onChange={set("startDate")}
          />
        </FormField>
        <FormField id="production-end" label="End date" error={errorFor("endDate")}>
          <Input id="production-end" type="date" value={values.endDate} onChange={set("endDate")} />
        </FormField>
      </div>
      <FormField id="production-notes" label="Notes" error={errorFor("notes")}>
        <Textarea id="production-notes" value={values.notes} onChange={set("notes")} />
      </FormField>
    </div>
  );
}
