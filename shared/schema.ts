export * from "./models/users";
export * from "./models/catalog";
export * from "./models/bookings";
export * from "./models/rewards";
