export * from "./core/Client";
export * from "./core/RegistrationClient";
export * from "./onboarding";
export * from "./util/LoggerCommon";
