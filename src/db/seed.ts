import { db, schema } from "./index";

const defaultChallenges = [
  { title: "Recycle 1 old phone", co2Saved: 1.0, order: 1 },
  { title: "Drop off a dead laptop battery", co2Saved: 0.8, order: 2 },
  { title: "Donate a working charger", co2Saved: 0.3, order: 3 },
  { title: "Repair a device instead of replacing it", co2Saved: 2.5, order: 4 },
  { title: "Organise a household e-waste sort", co2Saved: 1.5, order: 5 },
  { title: "Bring a neighbour's e-waste to a center", co2Saved: 1.2, order: 6 },
];

// Grams of recoverable metal per device
const defaultDevices = [
  { modelName: "iPhone 11", metalValue: 12.5 },
  { modelName: "Samsung Galaxy S10", metalValue: 11.8 },
  { modelName: "Redmi Note 8", metalValue: 9.4 },
  { modelName: "Dell Inspiron 15", metalValue: 48.0 },
  { modelName: "HP Pavilion 14", metalValue: 45.2 },
  { modelName: "iPad 6th Gen", metalValue: 21.3 },
];

export async function seedChallenges() {
  const existing = await db.select({ id: schema.challenges.id }).from(schema.challenges).limit(1);

  if (existing.length === 0) {
    console.log("Seeding challenges...");
    await db.insert(schema.challenges).values(defaultChallenges);
    console.log(`Seeded ${defaultChallenges.length} challenges`);
  } else {
    console.log("Challenges already exist, skipping seed");
  }
}

export async function seedDevices() {
  const existing = await db.select({ id: schema.devices.id }).from(schema.devices).limit(1);

  if (existing.length === 0) {
    console.log("Seeding devices...");
    await db.insert(schema.devices).values(defaultDevices);
    console.log(`Seeded ${defaultDevices.length} devices`);
  } else {
    console.log("Devices already exist, skipping seed");
  }
}

export async function seedDefaults() {
  await seedChallenges();
  await seedDevices();
}
