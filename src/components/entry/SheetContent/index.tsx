import { useState } from "react";
import { Box, Button, Spacer, Text, VStack } from "@chakra-ui/react";
import { observer } from "mobx-react-lite";
import { useStore } from "../../../store/StoreContext";
import type { TransactionDetails, TransactionDraft } from "../../../types";
import { createDetails } from "../../../lib/transactions";
import { snappy, springAnimation } from "../../../lib/motion";
import { Keypad } from "../Keypad";
import { DetailsForm } from "../DetailsForm";

const detailsFade = springAnimation(snappy(0.3));

interface SheetContentProps {
  onSubmit: (draft: TransactionDraft) => void;
}

export const SheetContent = observer(function SheetContent({
  onSubmit,
}: SheetContentProps) {
  const { sheetStore } = useStore();
  const { amount } = sheetStore;
  const [details, setDetails] = useState<TransactionDetails>(() =>
    createDetails(),
  );

  const handleAdd = () => {
    if (amount.isZero) return;
    onSubmit({
      ...details,
      amount: amount.value,
      amountText: amount.displayText,
    });
    setDetails(createDetails());
    sheetStore.close();
  };

  return (
    <VStack gap="3" p="4" w="full" flex="1">
      <Text
        data-testid="amount"
        fontSize="4xl"
        fontWeight="bold"
        lineHeight="short"
      >
        {amount.formatted}
      </Text>

      {sheetStore.fullScreen ? (
        <>
          <Box w="full" animationName="fade-in" {...detailsFade}>
            <DetailsForm
              form={details}
              onFormChange={setDetails}
              onFocusChange={(focused) => sheetStore.setDetailsFocused(focused)}
            />
          </Box>
          <Spacer />
        </>
      ) : (
        <Button
          variant="plain"
          size="sm"
          color="fg.muted"
          onClick={() => sheetStore.expandDetails()}
        >
          Add Details
        </Button>
      )}

      <VStack w="full" gap="2">
        {sheetStore.showKeypad && (
          <Box w="full" animation="fade-in 0.2s ease-out">
            <Keypad onButtonTap={(button) => amount.press(button)} />
          </Box>
        )}
        <Button
          w="full"
          size="lg"
          rounded="full"
          colorPalette="blue"
          fontWeight="semibold"
          disabled={amount.isZero}
          onClick={handleAdd}
        >
          Add
        </Button>
      </VStack>
    </VStack>
  );
});
