import React from "react";
import { Box, Static, Text } from "ink";
import Spinner from "ink-spinner";
import type { ViewLevel, ViewMessage } from "../lib/types.js";

export interface BatchState {
  appName: string;
  index: number;
  total: number;
}

const PREFIXES: Record<ViewLevel, string> = {
  info: "INFO: ",
  warn: "WARN: ",
  detail: "",
  plain: "",
};

const COLORS: Partial<Record<ViewLevel, string>> = {
  info: "cyan",
  warn: "yellow",
  detail: "gray",
};

export function formatMessage(message: ViewMessage): string {
  return `${PREFIXES[message.level]}${message.text}`;
}

export function MessageLine({ message }: { message: ViewMessage }) {
  return <Text color={COLORS[message.level]}>{formatMessage(message)}</Text>;
}

export function BatchStatus({ batch }: { batch: BatchState }) {
  return (
    <Box>
      <Text color="cyan">
        <Spinner type="dots" />
      </Text>
      <Text> </Text>
      <Text>
        [{batch.index + 1}/{batch.total}] generating {batch.appName}
      </Text>
    </Box>
  );
}

interface RunViewProps {
  messages: ViewMessage[];
  verbose: boolean;
  batch: BatchState | null;
}

export function RunView({ messages, verbose, batch }: RunViewProps) {
  const visible = messages
    .filter((message) => verbose || message.level !== "detail")
    .map((message, id) => ({ ...message, id }));

  return (
    <>
      <Static items={visible}>
        {(message) => <MessageLine key={message.id} message={message} />}
      </Static>
      {batch && <BatchStatus batch={batch} />}
    </>
  );
}
