import { Box, HStack, IconButton } from "@chakra-ui/react";
import { LuX } from "react-icons/lu";
import { observer } from "mobx-react-lite";
import { useStore } from "../../../store/StoreContext";
import type { TransactionDraft } from "../../../types";
import { SheetContent } from "../SheetContent";

interface EntrySheetProps {
  onSubmit: (draft: TransactionDraft) => void;
}

export const EntrySheet = observer(function EntrySheet({
  onSubmit,
}: EntrySheetProps) {
  const { sheetStore } = useStore();
  const { fullScreen } = sheetStore;

  return (
    <Box
      display="flex"
      flexDirection="column"
      w="full"
      h={fullScreen ? "full" : undefined}
    >
      <HStack justify="flex-end" px="4" pt={fullScreen ? "1" : "4"}>
        <IconButton
          aria-label="Close"
          size="xs"
          rounded="full"
          variant="subtle"
          onClick={() => sheetStore.close()}
        >
          <LuX />
        </IconButton>
      </HStack>
      <SheetContent onSubmit={onSubmit} />
    </Box>
  );
});
