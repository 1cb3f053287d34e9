import { Button, Grid, Text } from "@chakra-ui/react";
import { LuDelete } from "react-icons/lu";
import type { KeypadButton } from "../../../types";
import {
  KEYPAD_ROWS,
  keypadButtonKey,
  keypadButtonLabel,
} from "../../../lib/keypad";
import { keypadKeyStyles } from "../sheetSurface";

interface KeypadProps {
  onButtonTap: (button: KeypadButton) => void;
  scaleWithPress?: boolean;
}

function KeyFace({ button }: { button: KeypadButton }) {
  if (button.kind === "number") return <Text>{button.value}</Text>;
  if (button.operation === "decimal") return <Text>.</Text>;
  return <LuDelete />;
}

export function Keypad({ onButtonTap, scaleWithPress = true }: KeypadProps) {
  return (
    <Grid templateColumns="repeat(3, 1fr)" gap="2" w="full">
      {KEYPAD_ROWS.flat().map((button) => (
        <Button
          key={keypadButtonKey(button)}
          aria-label={keypadButtonLabel(button)}
          variant="ghost"
          fontSize="20px"
          p="12px"
          h="auto"
          w="full"
          css={keypadKeyStyles(scaleWithPress)}
          onClick={() => onButtonTap(button)}
        >
          <KeyFace button={button} />
        </Button>
      ))}
    </Grid>
  );
}
