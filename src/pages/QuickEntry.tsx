import { Box, Flex, IconButton, Presence } from "@chakra-ui/react";
import { LuPlus } from "react-icons/lu";
import { observer } from "mobx-react-lite";
import { useStore } from "../store/StoreContext";
import { useColorMode } from "../components/ui/color-mode";
import { toaster } from "../components/ui/toaster";
import { EntrySheet } from "../components/entry/EntrySheet";
import {
  sheetInset,
  sheetSurfaceStyles,
} from "../components/entry/sheetSurface";
import { appConfig } from "../lib/config";
import { presenceAnimation } from "../lib/motion";
import { describeDraft } from "../lib/transactions";
import type { TransactionDraft } from "../types";

const sheetSpring = presenceAnimation(appConfig.sheetSpring);

const QuickEntry = observer(function QuickEntry() {
  const { sheetStore } = useStore();
  const { colorMode } = useColorMode();
  const { expanded, fullScreen } = sheetStore;

  const handleSubmit = (draft: TransactionDraft) => {
    console.info("Transaction draft:", draft);
    toaster.create({
      type: "success",
      title: `Added ${appConfig.currencySymbol}${draft.amountText}`,
      description: describeDraft(draft),
    });
  };

  return (
    <Flex
      h="100dvh"
      w="full"
      align="flex-end"
      justify="center"
      p={sheetInset(fullScreen)}
    >
      <Box
        css={sheetSurfaceStyles({ colorMode, fullScreen })}
        w={expanded ? "full" : "auto"}
        maxW={fullScreen ? "none" : "md"}
        h={fullScreen ? "full" : undefined}
        overflow="hidden"
        transition="max-width 0.35s, padding 0.35s"
      >
        <Presence
          present={!expanded}
          lazyMount
          unmountOnExit
          animationName={{ _open: "trigger-in", _closed: "trigger-out" }}
          {...sheetSpring}
        >
          <IconButton
            aria-label="New transaction"
            variant="ghost"
            px="20px"
            py="12px"
            onClick={() => sheetStore.open()}
          >
            <LuPlus />
          </IconButton>
        </Presence>
        <Presence
          present={expanded}
          lazyMount
          unmountOnExit
          animationName={{ _open: "sheet-in", _closed: "sheet-out" }}
          transformOrigin="bottom"
          h={fullScreen ? "full" : undefined}
          {...sheetSpring}
        >
          <EntrySheet onSubmit={handleSubmit} />
        </Presence>
      </Box>
    </Flex>
  );
});

export default QuickEntry;
