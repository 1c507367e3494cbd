// src/sites/climatico/adapter.ts
import type {
  FeatureLabelMap,
  FeatureSetter,
  StorefrontAdapter,
} from "../../core/types/index";
import type { TextField } from "../../core/types/product";

/** Values starting with this token ("Da") count as yes */
export const AFFIRMATIVE_TOKEN = "D";

const assign =
  (field: TextField): FeatureSetter =>
  (record, value) => {
    record[field] = value;
  };

// Etichete din tabelul de caracteristici (exact cum apar pe site)
const featureLabels: FeatureLabelMap = {
  "Cod produs:": assign("productCode"),
  "Capacitate racire:": assign("coolingBtuCapacity"),
  "Capacitate incalzire:": assign("heatingBtuCapacity"),
  "Clasa energetica racire:": assign("coolingEnergyClass"),
  "Clasa energetica incalzire:": assign("heatingEnergyClass"),
  "Tensiune alimentare:": assign("mainsVoltage"),
  "Nivel de zgomot racire:": assign("coolingNoiseLevel"),
  "Nivel de zgomot incalzire:": assign("heatingNoiseLevel"),
  "Lungime unitate interna:": assign("internalUnitLength"),
  // FIXME: any value that merely starts with "D" is read as yes
  "Conexiune Wi-Fi:": (record, value) => {
    record.hasWifiConnection = value.startsWith(AFFIRMATIVE_TOKEN);
  },
};

export const adapter: StorefrontAdapter = {
  key: "climatico",
  displayName: "Climatico",
  baseHost: "www.climatico.ro",
  startUrl: "https://www.climatico.ro/aer-conditionat/vrv",
  nextPageSelector: "head > link[rel=next]",
  selectors: {
    productItems: [
      { tag: "div", id: "amasty-shopby-product-list" },
      { tag: "div", classes: ["products", "wrapper", "list", "products-list"] },
      { tag: "ol", classes: ["products", "list", "items", "product-items"] },
      { tag: "li", relation: "child" },
    ],
    image: [{ tag: "img", classes: ["product-image-photo"] }],
    detailLink: [
      {
        tag: "strong",
        classes: ["product", "name", "product-item-name", "product-name"],
      },
      { tag: "a", classes: ["product-item-link"] },
    ],
    featureTableBody: [
      { tag: "table", classes: ["prod-list-features"] },
      { tag: "tbody" },
    ],
  },
  imageAttributes: { name: "alt", url: "data-amsrc" },
  featureLabels,
  defaults: { currency: "RON" },
  exportProfile: {
    productType: "Aer conditionat",
    googleProductCategory:
      "Home & Garden > Household Appliances > Climate Control Appliances > Air Conditioners",
    categorySeparator: " > ",
    descriptionLabels: {
      coolingBtuCapacity: "Capacitate racire",
      heatingBtuCapacity: "Capacitate incalzire",
      coolingEnergyClass: "Clasa energetica racire",
      heatingEnergyClass: "Clasa energetica incalzire",
      coolingNoiseLevel: "Nivel de zgomot racire",
      heatingNoiseLevel: "Nivel de zgomot incalzire",
      wifi: "Conexiune Wi-Fi",
      category: "Categorie",
      yes: "Da",
      no: "Nu",
    },
  },
};
