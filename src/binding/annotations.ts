/**
 * CodeMirror annotations shared by the reference editing surface.
 *
 * A binding passes a tag with every dispatch that originates from the replica
 * rather than from the user. The surface carries it on the transaction so the
 * binding can recognise, and skip, its own writes when they come back.
 */

import { Annotation } from "@codemirror/state";

export const surfaceTagAnnotation = Annotation.define<string>();
