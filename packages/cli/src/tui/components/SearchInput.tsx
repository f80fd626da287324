/**
 * SearchInput Component
 *
 * One-line prompt: the `/` filter and the `l` language switch.
 *
 * @module tui/components/SearchInput
 */

import { Box, Text } from "ink";
import TextInput from "ink-text-input";
import type React from "react";

export interface SearchInputProps {
  readonly value: string;
  readonly onChange: (value: string) => void;
  readonly onSubmit: (value: string) => void;
  readonly focus: boolean;
  readonly prompt?: string;
  readonly placeholder?: string;
}

export function SearchInput({
  value,
  onChange,
  onSubmit,
  focus,
  prompt = "/",
  placeholder = "filter projects",
}: SearchInputProps): React.ReactElement {
  return (
    <Box>
      <Text color="cyan">{prompt}</Text>
      <TextInput
        value={value}
        onChange={onChange}
        onSubmit={onSubmit}
        focus={focus}
        placeholder={placeholder}
      />
    </Box>
  );
}
