"use client";

import { Input, NativeSelect, Textarea } from "@rigtrack/ui";
import { FormField } from "@/components/forms/form-field";

export interface ItemFormValues {
  inventoryId: string;
  name: string;
  category: string;
  description: string;
  serialNumber: string;
  manufacturer: string;
  model: string;
  locationId: string;
}

export const emptyItem: ItemFormValues = {
  inventoryId: "",
  name: "",
  category: "",
  description: "",
  serialNumber: "",
  manufacturer: "",
  model: "",
  locationId: "",
};

interface ItemFormProps {
  values: ItemFormValues;
  onChange: (values: ItemFormValues) => void;
  locations: { id: string; path: string }[];
  categories: string[];
  /** Inventory IDs are fixed once the item exists */
  lockInventoryId?: boolean;
  errorFor: (field: keyof ItemFormValues) => string | undefined;
}

export function ItemForm({
  values,
  onChange,
  locations,
  categories,
  lockInventoryId = false,
  errorFor,
}: ItemFormProps) {
  const set =
    (field: keyof ItemFormValues) =>
    (e: React.ChangeEvent<HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement>) =>
      onChange({ ...values, [field]: e.target.value });

  return (
    <div className="grid gap-4 sm:grid-cols-2">
      <FormField id="item-inventory-id" label="Inventory ID" error={errorFor("inventoryId")}>
        <Input
          id="item-inventory-id"
          value={values.inventoryId}
          onChange={set("inventoryId")}
          disabled={lockInventoryId}
          placeholder="e.g. AUD-0001"
        />
      </FormField>
      <FormField id="item-name" label="Name" error={errorFor("name")}>
        <Input id="item-name" value={values.name} onChange={set("name")} />
      </FormField>
      <FormField id="item-category" label="Category" error={errorFor("category")}>
        <Input
          id="item-category"
          list="item-categories"
          value={values.category}
          onChange={set("category")}
        />
        <datalist id="item-categories">
          {categories.map((category) => (
            <option key={category} value={category} />
          ))}
        </datalist>
      </FormField>
      <FormField id="item-location" label="Location" error={errorFor("locationId")}>
        <NativeSelect id="item-location" value={values.locationId} onChange={set("locationId")}>
          <option value="">No location</option>
          {locations.map((location) => (
            <option key={location.id} value={location.id}>
              {location.path}
            </option>
          ))}
        </NativeSelect>
      </FormField>
      <FormField id="item-manufacturer" label="Manufacturer" error={errorFor("manufacturer")}>
        <Input id="item-manufacturer" value={values.manufacturer} onChange={set("manufacturer")} />
      </FormField>
      <FormField id="item-model" label="Model" error={errorFor("model")}>
        <Input id="item-model" value={values.model} onChange={set("model")} />
      </FormField>
      <FormField id="item-serial" label="Serial number" error={errorFor("serialNumber")}>
        <Input id="item-serial" value={values.serialNumber} onChange={set("serialNumber")} />
      </FormField>
      <div className="sm:col-span-2">
        <FormField id="item-description" label="Description" error={errorFor("description")}>
          <Textarea
            id="item-description"
            value={values.description}
            onChange={set("description")}
          />
        </FormField>
      </div>
    </div>
  );
}
