"use client";

import { createTRPCReact } from "@trpc/react-query";
import type { AppRouter } from "@rigtrack/core/trpc";

export const trpc = createTRPCReact<AppRouter>();
