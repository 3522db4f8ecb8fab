export enum Severity {
    HIGH = "High",
    MEDIUM = "Medium",
    LOW = "Low",
}
