export const DEFAULT_LOOKUP_FILE = "lookup_table.csv";
export const DEFAULT_LOG_FILE = "flow.log";
export const DEFAULT_TAG_OUTPUT = "tag_counts_output.csv";
export const DEFAULT_PORT_OUTPUT = "port_protocol_counts_output.csv";

export const UNTAGGED = "Untagged";

export const KEY_SEPARATOR = ",";

export const TAG_REPORT_HEADER = "Tag,Count";
export const PORT_REPORT_HEADER = "Port,Protocol,Count";

export const MAX_PORT = 65535;

// VPC flow logs, version 2 default format.
export const FLOW_LOG_VERSION = 2;
export const FLOW_LOG_FIELD_COUNT = 14;
export const FIELD_VERSION = 0;
export const FIELD_SRC_PORT = 5;
export const FIELD_DST_PORT = 6;
export const FIELD_PROTOCOL = 7;
export const FIELD_ACTION = 12;
export const FIELD_LOG_STATUS = 13;
export const LOG_STATUS_OK = "OK";

// IANA assigned internet protocol numbers.
export const PROTOCOL_NAMES: Readonly<Record<number, string>> = {
  1: "icmp",
  2: "igmp",
  6: "tcp",
  17: "udp",
  41: "ipv6",
  47: "gre",
  50: "esp",
  51: "ah",
  58: "ipv6-icmp",
  132: "sctp",
};
