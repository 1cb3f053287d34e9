import type { ReactNode } from "react";
import { HStack, Icon, Input, Spacer, Text, VStack } from "@chakra-ui/react";
import type { IconType } from "react-icons";
import {
  LuCalendarPlus,
  LuChevronsUpDown,
  LuFolder,
  LuSquarePlus,
} from "react-icons/lu";
import type { TransactionDetails } from "../../../types";
import {
  TRANSACTION_CATEGORIES,
  TRANSACTION_TYPES,
  optionLabel,
} from "../../../lib/transactions";
import { detailRowStyles } from "../sheetSurface";

interface DetailsFormProps {
  form: TransactionDetails;
  onFormChange: (form: TransactionDetails) => void;
  onFocusChange?: (focused: boolean) => void;
}

function LabeledRow({
  icon,
  title,
  children,
}: {
  icon: IconType;
  title: string;
  children: ReactNode;
}) {
  const RowIcon = icon;
  return (
    <HStack w="full" css={detailRowStyles}>
      <Icon size="lg" color="blue.solid">
        <RowIcon />
      </Icon>
      <Text>{title}</Text>
      <Spacer />
      {children}
    </HStack>
  );
}

interface PickerRowProps<T extends string> {
  icon: IconType;
  title: string;
  value: T;
  options: readonly T[];
  onChange: (value: T) => void;
}

function PickerRow<T extends string>({
  icon,
  title,
  value,
  options,
  onChange,
}: PickerRowProps<T>) {
  return (
    <LabeledRow icon={icon} title={title}>
      <HStack gap="1" color="fg.muted">
        <select
          aria-label={title}
          value={value}
          onChange={(e) => {
            const next = options.find((option) => option === e.target.value);
            if (next !== undefined) onChange(next);
          }}
          style={{
            appearance: "none",
            background: "transparent",
            border: "none",
            color: "inherit",
            textAlign: "right",
            cursor: "pointer",
          }}
        >
          {options.map((option) => (
            <option key={option} value={option}>
              {optionLabel(option)}
            </option>
          ))}
        </select>
        <LuChevronsUpDown aria-hidden />
      </HStack>
    </LabeledRow>
  );
}

export function DetailsForm({
  form,
  onFormChange,
  onFocusChange,
}: DetailsFormProps) {
  return (
    <VStack
      w="full"
      gap="2"
      // moves between fields of the form are not reported
      onFocus={(e) => {
        if (!e.currentTarget.contains(e.relatedTarget)) onFocusChange?.(true);
      }}
      onBlur={(e) => {
        if (!e.currentTarget.contains(e.relatedTarget)) onFocusChange?.(false);
      }}
    >
      <Input
        aria-label="Name"
        placeholder="Enter name..."
        textAlign="center"
        borderWidth="0"
        css={detailRowStyles}
        value={form.name}
        onChange={(e) => onFormChange({ ...form, name: e.target.value })}
      />
      <PickerRow
        icon={LuSquarePlus}
        title="Type"
        value={form.type}
        options={TRANSACTION_TYPES}
        onChange={(type) => onFormChange({ ...form, type })}
      />
      <PickerRow
        icon={LuFolder}
        title="Category"
        value={form.category}
        options={TRANSACTION_CATEGORIES}
        onChange={(category) => onFormChange({ ...form, category })}
      />
      <LabeledRow icon={LuCalendarPlus} title="Date">
        <Input
          aria-label="Date"
          type="date"
          size="sm"
          w="auto"
          borderWidth="0"
          bg="transparent"
          value={form.date}
          onChange={(e) =>
            // a cleared date input keeps the previous day
            onFormChange({ ...form, date: e.target.value || form.date })
          }
        />
      </LabeledRow>
    </VStack>
  );
}
