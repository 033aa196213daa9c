export { Marshaller, marshal, isJsonValue } from "@/engine/marshal"
export { Unmarshaller, unmarshal, unmarshalResponse } from "@/engine/unmarshal"
export { createCodec, type Codec } from "@/engine/codec"
