/**
 * ERP value objects
 *
 * Shapes produced by the response normalizer and consumed by the entity
 * mappers. Field names of the *Payload types follow the ERP's wire format
 * (PascalCase), internal value objects use camelCase.
 */

/** Untyped JSON object as returned by the ERP */
export type ErpRecord = Record<string, unknown>;

// ============================================
// NORMALIZED RESPONSES
// ============================================

export interface ParsedCollection<T = ErpRecord> {
    items: T[];
    /** Total count when the query asked for `$count` */
    count: number | null;
    /** Next page link when the ERP paged the result */
    nextLink: string | null;
}

export interface ErpErrorInfo {
    code: string;
    message: string;
}

export interface WarehouseStock {
    inStock: number;
    committed: number;
    available: number;
}

export interface ItemStock {
    itemCode: string | null;
    /** Top-level QuantityOnStock, independent of the warehouse breakdown */
    total: number;
    byWarehouse: Record<string, WarehouseStock>;
}

export interface ErpDocumentLine {
    lineNum: number;
    itemCode: string | null;
    description: string | null;
    quantity: number;
    unitPrice: number;
    lineTotal: number;
    warehouseCode: string | null;
    taxCode: string | null;
}

export interface ErpOrder {
    docEntry: number | null;
    docNum: number | null;
    status: string | null;
    docDate: string | null;
    dueDate: string | null;
    cardCode: string | null;
    cardName: string | null;
    total: number;
    currency: string | null;
    lines: ErpDocumentLine[];
    comments: string | null;
}

export interface ErpBusinessPartner {
    cardCode: string | null;
    cardName: string | null;
    cardType: string | null;
    email: string | null;
    phone: string | null;
    address: string | null;
    city: string | null;
    country: string | null;
    zipCode: string | null;
    valid: boolean;
}

// ============================================
// OUTBOUND PAYLOADS
// ============================================

export interface ErpDocumentLinePayload {
    ItemCode: string;
    Quantity: number;
    UnitPrice: number;
    DiscountPercent?: number;
    WarehouseCode?: string;
    TaxCode?: string;
    FreeText?: string;
}

export interface ErpOrderPayload {
    CardCode: string;
    DocDate: string;
    DocDueDate: string;
    NumAtCard: string;
    Comments: string;
    DocumentLines: ErpDocumentLinePayload[];
    ShipToCode?: string;
    PaymentMethod?: string;
}

export type ErpAddressType = 'bo_BillTo' | 'bo_ShipTo';

export interface ErpPartnerAddressPayload {
    AddressName: 'BILL' | 'SHIP';
    AddressType: ErpAddressType;
    Street: string;
    Block: string;
    City: string;
    State: string;
    ZipCode: string;
    Country: string;
}

export interface ErpContactPayload {
    Name: string;
    FirstName: string;
    LastName: string;
    E_Mail: string;
    Phone1: string;
    MobilePhone: string;
}

export interface ErpBusinessPartnerPayload {
    CardCode: string;
    CardName: string;
    CardType: 'cCustomer';
    EmailAddress: string;
    Phone1: string;
    Cellular: string;
    Address: string;
    City: string;
    Country: string;
    ZipCode: string;
    Currency: string;
    BPAddresses: ErpPartnerAddressPayload[];
    ContactEmployees: ErpContactPayload[];
}
