// SPDX-License-Identifier: MIT
// Circwait JSON Schemas
// Generated from Zod schemas via z.toJSONSchema()

import { z } from "zod/v4";
import { EventStreamSchema, KnowledgeSnapshotSchema } from "./zod-schemas.ts";

//==============================================================================
// Generated JSON Schemas
//==============================================================================

/** Schema handed to front-ends that produce event streams */
export const eventStreamSchema = z.toJSONSchema(EventStreamSchema);

export const knowledgeSnapshotSchema = z.toJSONSchema(KnowledgeSnapshotSchema);
